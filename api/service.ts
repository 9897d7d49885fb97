import type { AnalysisRunner } from "../trigger/analysis-runner";
import {
  AnalysisTaskError,
  NotFoundError,
  errorMessage,
} from "../trigger/errors";
import { executeAnalysis } from "../trigger/execute-analysis";
import type { TaskQueue } from "../trigger/queue/task-queue";
import type {
  AnalysisRecord,
  AnalysisTaskPayload,
  AnalyticsSummary,
  UserRecord,
} from "../trigger/types";
import type { ResultStore } from "../trigger/utils/result-store";
import { removeUpload, saveUpload } from "../trigger/utils/uploads";
import type { AnalyzeInput } from "./validation";

export interface AnalysisServiceDependencies {
  queue: TaskQueue;
  resultStore: ResultStore;
  runner: AnalysisRunner;
  uploadDir: string;
}

export interface SubmittedAnalysis {
  taskId: string;
  contentHash: string;
}

export type SyncOutcome =
  | {
      status: "success";
      analysisId: number;
      result: string;
      processingTime: number;
    }
  | {
      status: "error";
      analysisId: number | null;
      detail: string;
    };

export type TaskStatusView =
  | { state: "pending" }
  | { state: "in-progress"; progressDetail: string | null }
  | { state: "succeeded"; analysisId: number | null; result: string | null }
  | { state: "failed"; analysisId: number | null; error: string }
  | { state: "unknown" };

export interface HealthReport {
  healthy: boolean;
  database: boolean;
  taskQueue: boolean;
  backend: TaskQueue["backend"];
}

export class AnalysisService {
  constructor(private readonly deps: AnalysisServiceDependencies) {}

  /**
   * Persists the upload and enqueues it; returns before any analysis runs.
   */
  async submit(input: AnalyzeInput): Promise<SubmittedAnalysis> {
    const saved = await saveUpload(
      this.deps.uploadDir,
      input.fileName,
      input.content
    );
    const payload = this.buildPayload(input, saved.filePath, saved.contentHash);

    try {
      const taskId = await this.deps.queue.enqueue(payload);
      console.log(
        `[analysis-service] Enqueued task ${taskId} (${input.analysisType}) for ${input.userId}`
      );
      return { taskId, contentHash: saved.contentHash };
    } catch (error) {
      await removeUpload(saved.filePath);
      throw error;
    }
  }

  /**
   * Runs the analysis on the request path. The upload is removed on every
   * exit path.
   */
  async runSync(input: AnalyzeInput): Promise<SyncOutcome> {
    const saved = await saveUpload(
      this.deps.uploadDir,
      input.fileName,
      input.content
    );

    try {
      const output = await executeAnalysis(
        this.buildPayload(input, saved.filePath, saved.contentHash),
        { resultStore: this.deps.resultStore, runner: this.deps.runner }
      );
      const record = await this.deps.resultStore.getById(output.analysisId);

      return {
        status: "success",
        analysisId: output.analysisId,
        result: record?.result ?? "",
        processingTime: output.processingTime,
      };
    } catch (error) {
      if (error instanceof AnalysisTaskError) {
        return {
          status: "error",
          analysisId: error.analysisId,
          detail: `Error processing document: ${error.message}`,
        };
      }
      throw error;
    } finally {
      await removeUpload(saved.filePath);
    }
  }

  /**
   * Terminal states mirror the stored AnalysisResult row; the queue's own
   * error text is only used when no row was written.
   */
  async getTaskStatus(taskId: string): Promise<TaskStatusView> {
    const snapshot = await this.deps.queue.getStatus(taskId);

    switch (snapshot.state) {
      case "pending":
        return { state: "pending" };
      case "unknown":
        return { state: "unknown" };
      case "in-progress":
        return {
          state: "in-progress",
          progressDetail: snapshot.progressDetail ?? null,
        };
      case "succeeded": {
        const record = await this.findRecord(snapshot.analysisId);
        return {
          state: "succeeded",
          analysisId: snapshot.analysisId ?? null,
          result: record?.result ?? null,
        };
      }
      case "failed": {
        const record = await this.findRecord(snapshot.analysisId);
        return {
          state: "failed",
          analysisId: snapshot.analysisId ?? null,
          error: record?.result ?? snapshot.error ?? "Analysis failed",
        };
      }
    }
  }

  async history(userId: string, limit?: number): Promise<AnalysisRecord[]> {
    return this.deps.resultStore.listByUser(userId, limit);
  }

  async analytics(): Promise<AnalyticsSummary> {
    return this.deps.resultStore.aggregate();
  }

  async registerUser(userId: string, email: string): Promise<UserRecord> {
    return this.deps.resultStore.registerUser(userId, email);
  }

  async getUser(userId: string): Promise<UserRecord> {
    const user = await this.deps.resultStore.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }

  async health(): Promise<HealthReport> {
    const [database, taskQueue] = await Promise.all([
      this.deps.resultStore.ping(),
      this.deps.queue.ping(),
    ]);

    return {
      healthy: database && taskQueue,
      database,
      taskQueue,
      backend: this.deps.queue.backend,
    };
  }

  private buildPayload(
    input: AnalyzeInput,
    filePath: string,
    contentHash: string
  ): AnalysisTaskPayload {
    return {
      filePath,
      fileName: input.fileName,
      query: input.query,
      analysisType: input.analysisType,
      userId: input.userId,
      contentHash,
    };
  }

  private async findRecord(
    analysisId: number | undefined
  ): Promise<AnalysisRecord | null> {
    if (analysisId === undefined) {
      return null;
    }
    try {
      return await this.deps.resultStore.getById(analysisId);
    } catch (error) {
      console.error(
        `[analysis-service] Failed to load analysis ${analysisId}: ${errorMessage(error)}`
      );
      return null;
    }
  }
}
