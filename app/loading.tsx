import { Skeleton } from "@/components/ui/skeleton";

export default function ExplorerLoading() {
  return (
    <div className="space-y-6">
      <div>
        <Skeleton className="h-8 w-56" />
        <Skeleton className="mt-2 h-5 w-96" />
      </div>
      <div className="flex flex-col gap-6 md:flex-row">
        <Skeleton className="h-[420px] w-full md:w-72" />
        <Skeleton className="h-[420px] flex-1" />
      </div>
    </div>
  );
}
