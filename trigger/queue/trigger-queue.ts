import { readFile } from "node:fs/promises";
import { runs, tasks } from "@trigger.dev/sdk";
import { errorMessage } from "../errors";
import type {
  AnalysisTaskPayload,
  TaskSnapshot,
  TaskState,
} from "../types/domain";
import { uploadFile } from "../utils/storage";
import { buildUploadStorageKey } from "../utils/storagePaths";
import { removeUpload } from "../utils/uploads";
import type { analyzeDocument } from "../workflow";
import { UNKNOWN_TASK, type TaskQueue } from "./task-queue";

export const ANALYZE_DOCUMENT_TASK_ID = "analyze-document";

// Run statuses from both the v3 and v4 run engines
const RUN_STATE: Record<string, Exclude<TaskState, "unknown">> = {
  PENDING_VERSION: "pending",
  WAITING_FOR_DEPLOY: "pending",
  DELAYED: "pending",
  QUEUED: "pending",
  DEQUEUED: "in-progress",
  EXECUTING: "in-progress",
  WAITING: "in-progress",
  REATTEMPTING: "in-progress",
  FROZEN: "in-progress",
  COMPLETED: "succeeded",
  CANCELED: "failed",
  FAILED: "failed",
  CRASHED: "failed",
  INTERRUPTED: "failed",
  SYSTEM_FAILURE: "failed",
  EXPIRED: "failed",
  TIMED_OUT: "failed",
};

export interface RunSnapshot {
  status: string;
  output?: unknown;
  error?: { message: string };
  metadata?: Record<string, unknown>;
}

function readAnalysisId(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "object" && value !== null && "analysisId" in value) {
    return readAnalysisId(value.analysisId);
  }
  return undefined;
}

/**
 * Maps a trigger.dev run onto the task states. The analysis id comes from
 * the run output on success and from run metadata on failure.
 */
export function mapRunToSnapshot(run: RunSnapshot): TaskSnapshot {
  const state = RUN_STATE[run.status] ?? "in-progress";
  const progress = run.metadata?.progress;

  switch (state) {
    case "pending":
      return { state };
    case "in-progress":
      return {
        state,
        progressDetail: typeof progress === "string" ? progress : undefined,
      };
    case "succeeded":
      return { state, analysisId: readAnalysisId(run.output) };
    case "failed":
      return {
        state,
        analysisId: readAnalysisId(run.metadata?.analysisId),
        error: run.error?.message ?? `Run ended with status ${run.status}`,
      };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "status" in error && error.status === 404;
}

/**
 * Hands tasks to trigger.dev. Uploads are moved to object storage because
 * the workers do not share the API's disk.
 */
export class TriggerTaskQueue implements TaskQueue {
  readonly backend = "trigger";

  async enqueue(payload: AnalysisTaskPayload): Promise<string> {
    const storageKey = buildUploadStorageKey(payload.filePath);
    const content = await readFile(payload.filePath);

    await uploadFile(storageKey, content, "application/pdf", payload.fileName);
    await removeUpload(payload.filePath);

    const handle = await tasks.trigger<typeof analyzeDocument>(
      ANALYZE_DOCUMENT_TASK_ID,
      { ...payload, storageKey }
    );

    console.log(`[task-queue] Triggered run ${handle.id} for ${storageKey}`);
    return handle.id;
  }

  async getStatus(taskId: string): Promise<TaskSnapshot> {
    try {
      const run = await runs.retrieve(taskId);
      return mapRunToSnapshot(run);
    } catch (error) {
      if (isNotFound(error)) {
        return UNKNOWN_TASK;
      }
      console.error(
        `[task-queue] Failed to retrieve run ${taskId}: ${errorMessage(error)}`
      );
      return UNKNOWN_TASK;
    }
  }

  async ping(): Promise<boolean> {
    try {
      await runs.list({ limit: 1 });
      return true;
    } catch (error) {
      console.error(`[task-queue] trigger.dev ping failed:`, error);
      return false;
    }
  }
}
