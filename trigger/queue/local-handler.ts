import type { AnalysisRunner } from "../analysis-runner";
import { executeAnalysis } from "../execute-analysis";
import type { ResultStore } from "../utils/result-store";
import { removeUpload } from "../utils/uploads";
import type { TaskHandler } from "./in-process-queue";

/**
 * Task handler for the in-process queue: runs the execution contract and
 * removes the upload once the task is terminal.
 */
export function createLocalTaskHandler(
  resultStore: ResultStore,
  runner: AnalysisRunner
): TaskHandler {
  return async (payload, reportProgress) => {
    try {
      return await executeAnalysis(payload, {
        resultStore,
        runner,
        reportProgress,
      });
    } finally {
      await removeUpload(payload.filePath);
    }
  };
}
