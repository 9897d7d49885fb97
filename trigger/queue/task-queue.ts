import type { AnalysisTaskPayload, TaskSnapshot } from "../types/domain";

export interface TaskQueue {
  readonly backend: "local" | "trigger";
  /** Accepts a validated payload and returns an opaque task id without waiting for execution. */
  enqueue(payload: AnalysisTaskPayload): Promise<string>;
  /** Never throws; ids that were never issued or have expired report `unknown`. */
  getStatus(taskId: string): Promise<TaskSnapshot>;
  ping(): Promise<boolean>;
}

export const UNKNOWN_TASK: TaskSnapshot = { state: "unknown" };
