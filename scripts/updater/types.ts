import type { StyleMetrics } from "./metrics";

export interface ProjectDocument {
  project: string;
  commit: string | null;
  date: string | null;
  metrics: StyleMetrics;
}

export type RevisionMode = "head" | "random" | "recorded";

export type WriteOutcome = "written" | "unchanged";

export type UpdateStatus = WriteOutcome | "skipped" | "failed";

export interface UpdateResult {
  project: string;
  status: UpdateStatus;
  reason?: string;
}
