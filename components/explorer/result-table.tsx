"use client";

import {
  Table,
  TableBody,
  TableCell,
  TableHead,
  TableHeader,
  TableRow,
} from "@/components/ui/table";

export interface ResultColumn {
  name: string;
  typeName?: string;
}

interface ResultTableProps {
  columns: ResultColumn[];
  rows: (string | null)[][];
  /** Tailwind max-height class for the scroll area. */
  maxHeightClass?: string;
  emptyMessage?: string;
}

/**
 * Read-only grid for a tabular result. Null cells render as an italic
 * `null` so they are distinguishable from empty strings.
 */
export function ResultTable({
  columns,
  rows,
  maxHeightClass = "max-h-[400px]",
  emptyMessage = "No rows",
}: ResultTableProps) {
  return (
    <div className={`${maxHeightClass} overflow-auto rounded-md border`}>
      <Table>
        <TableHeader className="sticky top-0 z-10 bg-muted">
          <TableRow>
            <TableHead className="w-8 text-center text-[10px] text-muted-foreground">#</TableHead>
            {columns.map((col) => (
              <TableHead key={col.name} className="whitespace-nowrap text-xs">
                <div className="flex items-center gap-1">
                  <span>{col.name}</span>
                  {col.typeName && (
                    <span className="text-[10px] font-normal text-muted-foreground">
                      {col.typeName}
                    </span>
                  )}
                </div>
              </TableHead>
            ))}
          </TableRow>
        </TableHeader>
        <TableBody>
          {rows.length === 0 ? (
            <TableRow>
              <TableCell
                colSpan={columns.length + 1}
                className="py-6 text-center text-xs text-muted-foreground"
              >
                {emptyMessage}
              </TableCell>
            </TableRow>
          ) : (
            rows.map((row, ri) => (
              <TableRow key={ri}>
                <TableCell className="w-8 text-center text-[10px] text-muted-foreground">
                  {ri + 1}
                </TableCell>
                {row.map((cell, ci) => (
                  <TableCell key={ci} className="max-w-[240px] truncate text-xs">
                    {cell === null ? (
                      <span className="italic text-muted-foreground">null</span>
                    ) : (
                      cell
                    )}
                  </TableCell>
                ))}
              </TableRow>
            ))
          )}
        </TableBody>
      </Table>
    </div>
  );
}
