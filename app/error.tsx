"use client";

import { useEffect } from "react";
import { DatabaseZap } from "lucide-react";
import { Button } from "@/components/ui/button";

/**
 * Route-level error boundary. Load failures inside the explorer are shown
 * in their own panels; this only catches render errors.
 */
export default function ExplorerError({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    console.error("[explorer] render failed", error);
  }, [error]);

  return (
    <div role="alert" className="mx-auto max-w-lg space-y-4 rounded-md border border-destructive/50 p-6">
      <div className="flex items-center gap-2 text-destructive">
        <DatabaseZap className="h-5 w-5" />
        <h2 className="font-semibold">The explorer stopped rendering</h2>
      </div>
      <pre className="whitespace-pre-wrap rounded bg-muted p-3 font-mono text-xs text-muted-foreground">
        {error.message || "Unknown error"}
        {error.digest ? `\nError ID: ${error.digest}` : ""}
      </pre>
      <Button onClick={() => reset()}>Try Again</Button>
    </div>
  );
}
