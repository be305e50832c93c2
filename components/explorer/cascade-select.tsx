"use client";

import type { ReactNode } from "react";
import { AlertCircle, RefreshCw } from "lucide-react";
import { Label } from "@/components/ui/label";
import {
  Select,
  SelectContent,
  SelectItem,
  SelectTrigger,
  SelectValue,
} from "@/components/ui/select";
import type { Loadable } from "@/lib/explorer/state";

interface CascadeSelectProps<T> {
  id: string;
  label: string;
  icon: ReactNode;
  /** Idle means the parent is not selected yet. */
  source: Loadable<T[]>;
  optionValue: (item: T) => string;
  value: string | null;
  onChange: (value: string | null) => void;
  onRetry: () => void;
  placeholder: string;
  emptyMessage: string;
}

/**
 * One level of the catalog -> schema -> table cascade.
 */
export function CascadeSelect<T>({
  id,
  label,
  icon,
  source,
  optionValue,
  value,
  onChange,
  onRetry,
  placeholder,
  emptyMessage,
}: CascadeSelectProps<T>) {
  const options = source.status === "ready" ? source.data.map(optionValue) : [];
  const disabled = source.status !== "ready" || options.length === 0;

  return (
    <div className="space-y-2">
      <Label htmlFor={id}>{label}</Label>
      <Select
        value={value ?? ""}
        onValueChange={(v) => onChange(v || null)}
        disabled={disabled}
      >
        <SelectTrigger id={id} className="bg-background">
          <div className="flex items-center gap-2 truncate">
            {icon}
            <SelectValue placeholder={placeholder} />
          </div>
        </SelectTrigger>
        <SelectContent>
          {options.map((opt) => (
            <SelectItem key={opt} value={opt}>
              {opt}
            </SelectItem>
          ))}
        </SelectContent>
      </Select>

      {source.status === "loading" && (
        <div className="flex items-center gap-2 text-xs text-muted-foreground">
          <RefreshCw className="h-3 w-3 animate-spin" />
          Loading...
        </div>
      )}

      {source.status === "error" && (
        <div className="flex items-center gap-2 text-xs text-destructive">
          <AlertCircle className="h-3 w-3 shrink-0" />
          <span className="truncate" title={source.error}>{source.error}</span>
          <button
            type="button"
            onClick={onRetry}
            className="ml-1 underline hover:no-underline"
          >
            Retry
          </button>
        </div>
      )}

      {source.status === "ready" && options.length === 0 && (
        <p className="text-xs text-muted-foreground">{emptyMessage}</p>
      )}
    </div>
  );
}
