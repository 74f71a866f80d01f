import type { ProgressRecord, SyncDecision } from "@/types/progress";

/**
 * Last-write-wins by lastUpdate. The server record wins only when strictly
 * newer; equal timestamps keep the local record.
 */
export function resolveProgressConflict(local: ProgressRecord, remote: ProgressRecord): SyncDecision {
  return remote.lastUpdate > local.lastUpdate ? "adopt-remote" : "keep-local-and-upload";
}
