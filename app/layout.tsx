import type { Metadata } from "next";
import type { ReactNode } from "react";
import { Database } from "lucide-react";
import "./globals.css";

export const metadata: Metadata = {
  title: "Metadata Explorer",
  description:
    "Browse catalogs, schemas, and tables interactively with Databricks SQL.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        <a
          href="#main-content"
          className="sr-only focus:not-sr-only focus:fixed focus:left-4 focus:top-4 focus:z-50 focus:rounded-md focus:bg-primary focus:px-4 focus:py-2 focus:text-primary-foreground focus:outline-none"
        >
          Skip to main content
        </a>
        <div className="flex min-h-screen flex-col">
          <header className="flex h-12 shrink-0 items-center gap-2 border-b bg-background/80 px-4 backdrop-blur md:px-6">
            <Database className="h-4 w-4 text-primary" />
            <span className="text-sm font-semibold">Metadata Explorer</span>
          </header>
          <main id="main-content" className="flex-1">
            <div className="w-full px-6 py-6">{children}</div>
          </main>
          <footer className="border-t py-4 text-center text-sm text-muted-foreground">
            Unity Catalog metadata, read through a Databricks SQL warehouse.
          </footer>
        </div>
      </body>
    </html>
  );
}
