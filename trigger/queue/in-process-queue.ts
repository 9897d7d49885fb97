import { randomUUID } from "node:crypto";
import { AnalysisTaskError, errorMessage } from "../errors";
import type {
  AnalysisTaskOutput,
  AnalysisTaskPayload,
  TaskSnapshot,
  TaskState,
} from "../types/domain";
import { UNKNOWN_TASK, type TaskQueue } from "./task-queue";

const DEFAULT_CONCURRENCY = 2;
const DEFAULT_RETENTION_MS = 24 * 60 * 60 * 1000;

export type TaskHandler = (
  payload: AnalysisTaskPayload,
  reportProgress: (detail: string) => void
) => Promise<AnalysisTaskOutput>;

export interface InProcessTaskQueueOptions {
  concurrency?: number;
  /** How long terminal tasks stay queryable. */
  retentionMs?: number;
  now?: () => number;
  createId?: () => string;
  onTransition?: (taskId: string, state: TaskState) => void;
}

interface TaskRecord {
  id: string;
  payload: AnalysisTaskPayload;
  state: Exclude<TaskState, "unknown">;
  progressDetail?: string;
  analysisId?: number;
  error?: string;
  createdAt: number;
  finishedAt?: number;
}

/**
 * Bounded worker pool that runs analysis tasks inside the API process.
 * Tasks start in FIFO order; terminal records are never mutated and are
 * evicted once the retention period has passed.
 */
export class InProcessTaskQueue implements TaskQueue {
  readonly backend = "local";

  private readonly concurrency: number;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly createId: () => string;
  private readonly onTransition?: (taskId: string, state: TaskState) => void;

  private readonly records = new Map<string, TaskRecord>();
  private readonly backlog: string[] = [];
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly handler: TaskHandler,
    options: InProcessTaskQueueOptions = {}
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = options.now ?? Date.now;
    this.createId = options.createId ?? randomUUID;
    this.onTransition = options.onTransition;
  }

  async enqueue(payload: AnalysisTaskPayload): Promise<string> {
    this.evictExpired();

    const id = this.createId();
    this.records.set(id, {
      id,
      payload,
      state: "pending",
      createdAt: this.now(),
    });
    this.onTransition?.(id, "pending");
    this.backlog.push(id);
    this.drain();

    return id;
  }

  async getStatus(taskId: string): Promise<TaskSnapshot> {
    this.evictExpired();

    const record = this.records.get(taskId);
    if (!record) {
      return UNKNOWN_TASK;
    }

    return {
      state: record.state,
      progressDetail: record.progressDetail,
      analysisId: record.analysisId,
      error: record.error,
    };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  get pendingCount(): number {
    return this.backlog.length;
  }

  get runningCount(): number {
    return this.running.size;
  }

  /**
   * Resolves once the backlog is empty and no task is running.
   */
  async onIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  private drain(): void {
    while (this.running.size < this.concurrency && this.backlog.length > 0) {
      const id = this.backlog.shift();
      if (id === undefined) {
        break;
      }

      const execution = this.execute(id).finally(() => {
        this.running.delete(id);
        this.drain();
      });
      this.running.set(id, execution);
    }
  }

  private async execute(id: string): Promise<void> {
    const record = this.records.get(id);
    if (!record) {
      return;
    }

    this.transition(record, "in-progress");

    const reportProgress = (detail: string) => {
      if (record.state === "in-progress") {
        record.progressDetail = detail;
      }
    };

    try {
      const output = await this.handler(record.payload, reportProgress);
      record.analysisId = output.analysisId;
      record.progressDetail = undefined;
      this.transition(record, "succeeded");
    } catch (error) {
      console.error(`[task-queue] Task ${id} failed:`, errorMessage(error));
      if (error instanceof AnalysisTaskError && error.analysisId !== null) {
        record.analysisId = error.analysisId;
      }
      record.error = errorMessage(error);
      record.progressDetail = undefined;
      this.transition(record, "failed");
    }
  }

  private transition(
    record: TaskRecord,
    state: Exclude<TaskState, "unknown" | "pending">
  ): void {
    record.state = state;
    if (state === "succeeded" || state === "failed") {
      record.finishedAt = this.now();
    }
    this.onTransition?.(record.id, state);
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.retentionMs;
    for (const [id, record] of this.records) {
      if (record.finishedAt !== undefined && record.finishedAt <= cutoff) {
        this.records.delete(id);
      }
    }
  }
}
