"use client";

import { useEffect } from "react";

const page = {
  fontFamily: "system-ui, sans-serif",
  margin: 0,
  minHeight: "100vh",
  display: "flex",
  alignItems: "center",
  justifyContent: "center",
  background: "#ffffff",
  color: "#0f172a",
} as const;

const detail = {
  fontFamily: "monospace",
  fontSize: "0.875rem",
  background: "#f1f5f9",
  color: "#64748b",
  padding: "0.75rem",
  borderRadius: "6px",
  margin: "1.5rem 0",
} as const;

const button = {
  padding: "0.625rem 1.5rem",
  fontSize: "0.875rem",
  background: "#1b3a4b",
  color: "white",
  border: "none",
  borderRadius: "6px",
  cursor: "pointer",
} as const;

/** Replaces the root layout when the layout itself throws. */
export default function GlobalError({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    console.error("[global-error]", error);
  }, [error]);

  return (
    <html lang="en">
      <body style={page}>
        <div style={{ maxWidth: "480px", textAlign: "center", padding: "2rem" }}>
          <h1 style={{ fontSize: "1.5rem", fontWeight: 700 }}>
            Metadata Explorer failed to load
          </h1>
          <p style={detail}>
            {error.message || "Unknown error"}
            {error.digest && (
              <span style={{ display: "block", marginTop: "0.25rem", fontSize: "0.75rem" }}>
                Error ID: {error.digest}
              </span>
            )}
          </p>
          <button onClick={() => reset()} style={button}>
            Try Again
          </button>
        </div>
      </body>
    </html>
  );
}
