/**
 * Databricks credential provider.
 *
 * Supports three authentication modes (checked in priority order):
 *   1. **User authorization (on-behalf-of-user)**: When deployed as a
 *      Databricks App with user-auth scopes, the platform injects the
 *      user's access token in the `x-forwarded-access-token` header.
 *      Unity Catalog permissions then follow the logged-in user.
 *   2. **Local development**: Uses a PAT via DATABRICKS_TOKEN in .env.local.
 *   3. **App authorization (service principal)**: Falls back to OAuth M2M via
 *      DATABRICKS_CLIENT_ID / DATABRICKS_CLIENT_SECRET injected at runtime.
 *
 * Host and warehouse come from `getConfig()` (see ./config).
 */

import { headers as nextHeaders } from "next/headers";
import { getConfig } from "./config";
import { WarehouseAuthError, errorFromResponse } from "./errors";
import { fetchWithTimeout, TIMEOUTS } from "./fetch-with-timeout";

// ---------------------------------------------------------------------------
// OAuth token cache
// ---------------------------------------------------------------------------

interface OAuthToken {
  accessToken: string;
  expiresAt: number; // epoch ms
}

let _oauthToken: OAuthToken | null = null;

/** Drop the cached service principal token. */
export function resetOAuthToken(): void {
  _oauthToken = null;
}

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

/**
 * Try to read the user's access token from the Databricks Apps proxy header.
 *
 * Only works inside a Next.js request context (route handlers / server
 * components); elsewhere it returns null.
 */
async function getUserToken(): Promise<string | null> {
  try {
    const hdrs = await nextHeaders();
    return hdrs.get("x-forwarded-access-token") || null;
  } catch {
    // headers() throws when called outside a request context
    return null;
  }
}

async function exchangeClientCredentials(
  clientId: string,
  clientSecret: string
): Promise<OAuthToken> {
  const { host } = getConfig();
  const tokenUrl = `${host}/oidc/v1/token`;

  const resp = await fetchWithTimeout(
    tokenUrl,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
      },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        scope: "all-apis",
      }),
    },
    TIMEOUTS.AUTH
  );

  if (!resp.ok) {
    const text = await resp.text();
    // Any rejection at the token endpoint is a credential problem.
    if (resp.status >= 400 && resp.status < 500) {
      throw new WarehouseAuthError(
        `OAuth token exchange failed (${resp.status}): ${text}`,
        resp.status
      );
    }
    throw errorFromResponse(resp.status, text, "OAuth token exchange failed");
  }

  const data: { access_token: string; expires_in: number } = await resp.json();
  return {
    accessToken: data.access_token,
    expiresAt: Date.now() + data.expires_in * 1_000,
  };
}

/**
 * Obtain a Bearer token.
 *
 * Priority order:
 *   1. User authorization – `x-forwarded-access-token` header.
 *   2. PAT – `DATABRICKS_TOKEN` env var (local development).
 *   3. OAuth M2M – `DATABRICKS_CLIENT_ID` / `DATABRICKS_CLIENT_SECRET`.
 */
export async function getBearerToken(): Promise<string> {
  const userToken = await getUserToken();
  if (userToken) return userToken;

  const pat = process.env.DATABRICKS_TOKEN;
  if (pat) return pat;

  const clientId = process.env.DATABRICKS_CLIENT_ID;
  const clientSecret = process.env.DATABRICKS_CLIENT_SECRET;

  if (!clientId || !clientSecret) {
    throw new WarehouseAuthError(
      "No authentication credentials found. " +
        "Set DATABRICKS_TOKEN for local dev, or deploy as a Databricks App " +
        "(which injects DATABRICKS_CLIENT_ID / DATABRICKS_CLIENT_SECRET)."
    );
  }

  // Return cached token if still valid (with 60 s buffer)
  if (_oauthToken && Date.now() < _oauthToken.expiresAt - 60_000) {
    return _oauthToken.accessToken;
  }

  _oauthToken = await exchangeClientCredentials(clientId, clientSecret);
  return _oauthToken.accessToken;
}

/**
 * Get the current user's email from the Databricks Apps proxy headers.
 * Returns null when outside a request context or when user auth is off.
 */
export async function getCurrentUserEmail(): Promise<string | null> {
  try {
    const hdrs = await nextHeaders();
    return (
      hdrs.get("x-forwarded-email") ??
      hdrs.get("x-forwarded-preferred-username") ??
      null
    );
  } catch {
    return null;
  }
}

export async function getHeaders(): Promise<Record<string, string>> {
  const token = await getBearerToken();
  return {
    Authorization: `Bearer ${token}`,
    "Content-Type": "application/json",
  };
}
