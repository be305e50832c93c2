import Link from "next/link";
import { Button } from "@/components/ui/button";

export default function NotFound() {
  return (
    <div className="flex min-h-[50vh] flex-col items-center justify-center gap-3 text-center">
      <p className="font-mono text-sm text-muted-foreground">404</p>
      <h2 className="text-xl font-semibold">Nothing to explore here</h2>
      <p className="text-muted-foreground">
        Catalogs, schemas and tables are browsed from the explorer page.
      </p>
      <Button asChild variant="outline">
        <Link href="/">Open Metadata Explorer</Link>
      </Button>
    </div>
  );
}
