import type { AnalysisRunner } from "./analysis-runner";
import {
  AnalysisTaskError,
  PersistenceError,
  errorMessage,
} from "./errors";
import { getProfile } from "./profiles";
import type {
  AnalysisStatus,
  AnalysisTaskOutput,
  AnalysisTaskPayload,
  NewAnalysisRecord,
} from "./types/domain";
import type { ResultStore } from "./utils/result-store";

export interface ExecutionDependencies {
  resultStore: ResultStore;
  runner: AnalysisRunner;
  reportProgress?: (detail: string) => void;
  now?: () => number;
}

export const SAVING_PROGRESS = "Saving analysis result...";

export function analyzingProgress(payload: AnalysisTaskPayload): string {
  return `Analyzing document with the ${getProfile(payload.analysisType).label} profile...`;
}

// ============================================================================
// EXECUTION CONTRACT
// ============================================================================

/**
 * Runs one analysis and writes exactly one AnalysisResult row for it,
 * whatever the outcome.
 *
 * Failures of the runner are recorded as a "failed" row and re-thrown as an
 * {@link AnalysisTaskError} carrying the row id. A storage failure while
 * recording that row is logged and does not replace the analysis error.
 * A storage failure on the success path is recorded as a "failed" row where
 * possible and surfaces as an {@link AnalysisTaskError} caused by a
 * {@link PersistenceError}.
 */
export async function executeAnalysis(
  payload: AnalysisTaskPayload,
  deps: ExecutionDependencies
): Promise<AnalysisTaskOutput> {
  const taskId = "execute-analysis";
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const elapsedSeconds = () => (now() - startedAt) / 1000;

  console.log(`[${taskId}] Starting analysis for user: ${payload.userId}`);
  console.log(`[${taskId}] - File: ${payload.fileName}`);
  console.log(`[${taskId}] - Analysis Type: ${payload.analysisType}`);

  deps.reportProgress?.(analyzingProgress(payload));

  const buildRecord = (
    status: AnalysisStatus,
    result: string
  ): NewAnalysisRecord => ({
    userId: payload.userId,
    fileName: payload.fileName,
    query: payload.query,
    analysisType: payload.analysisType,
    result,
    processingTime: elapsedSeconds(),
    status,
    contentHash: payload.contentHash,
  });

  let result: string;
  try {
    result = await deps.runner.run({
      analysisType: payload.analysisType,
      filePath: payload.filePath,
      query: payload.query,
    });
  } catch (error) {
    const message = errorMessage(error);
    console.error(`[${taskId}] ❌ Analysis failed: ${message}`);

    let analysisId: number | null = null;
    try {
      const record = await deps.resultStore.record(
        buildRecord("failed", `Error: ${message}`)
      );
      analysisId = record.id;
      console.log(`[${taskId}] Failure recorded as analysis ${analysisId}`);
    } catch (storeError) {
      console.error(
        `[${taskId}] Failed to record failed analysis:`,
        storeError
      );
    }

    throw new AnalysisTaskError(message, analysisId, { cause: error });
  }

  deps.reportProgress?.(SAVING_PROGRESS);

  try {
    const record = await deps.resultStore.record(
      buildRecord("completed", result)
    );

    console.log(`[${taskId}] ✓ Analysis ${record.id} completed`);
    console.log(
      `[${taskId}] - Processing Time: ${record.processingTime.toFixed(2)}s`
    );

    return {
      status: "success",
      analysisId: record.id,
      processingTime: record.processingTime,
    };
  } catch (error) {
    console.error(`[${taskId}] Failed to record analysis result:`, error);
    const persistenceError = new PersistenceError(
      `Failed to record analysis result: ${errorMessage(error)}`,
      { cause: error }
    );

    // One attempt to leave a failed row behind for the caller to find
    let analysisId: number | null = null;
    try {
      const record = await deps.resultStore.record(
        buildRecord("failed", `Error: ${persistenceError.message}`)
      );
      analysisId = record.id;
      console.log(`[${taskId}] Failure recorded as analysis ${analysisId}`);
    } catch (storeError) {
      console.error(
        `[${taskId}] Failed to record failed analysis:`,
        storeError
      );
    }

    throw new AnalysisTaskError(persistenceError.message, analysisId, {
      cause: persistenceError,
    });
  }
}
