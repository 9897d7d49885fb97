import { join } from "node:path";
import { metadata, task } from "@trigger.dev/sdk";
import { createAnalysisRunner, type AnalysisRunner } from "./analysis-runner";
import { getConfig } from "./config";
import { AnalysisTaskError } from "./errors";
import { executeAnalysis } from "./execute-analysis";
import type { AnalysisTaskOutput, AnalysisTaskPayload } from "./types/domain";
import { getDb } from "./utils/db";
import { initLangfuseTracing, flushLangfuseTracing } from "./utils/langfuseInstrumentation";
import { PostgresResultStore, type ResultStore } from "./utils/result-store";
import { deleteFile, downloadFile } from "./utils/storage";
import { removeUpload, saveUpload } from "./utils/uploads";

export interface WorkerDependencies {
  resultStore: ResultStore;
  runner: AnalysisRunner;
  uploadDir: string;
}

// ============================================================================
// TASK: ANALYZE DOCUMENT
// ============================================================================

export async function runAnalyzeDocument(
  payload: AnalysisTaskPayload,
  deps: Partial<WorkerDependencies> = {}
): Promise<AnalysisTaskOutput> {
  const taskId = "analyze-document";
  console.log(`\n${"=".repeat(80)}`);
  console.log(`[${taskId}] 🚀 STARTING DOCUMENT ANALYSIS`);
  console.log(`${"=".repeat(80)}`);
  console.log(`[${taskId}] File: ${payload.fileName}`);
  console.log(`[${taskId}] Analysis Type: ${payload.analysisType}`);
  console.log(`[${taskId}] User: ${payload.userId}`);
  console.log(`[${taskId}] Content Hash: ${payload.contentHash}`);
  console.log(`${"=".repeat(80)}\n`);

  initLangfuseTracing();
  metadata.set("progress", "Fetching document...");

  const analysisRunner = deps.runner ?? createAnalysisRunner();
  const uploadDir = deps.uploadDir ?? join(getConfig().UPLOAD_DIR, "worker");
  const { storageKey } = payload;
  let localPath = payload.filePath;

  // The download happens inside the runner so that a missing object is
  // recorded as a failed analysis. Without a storage key the worker shares
  // the API's disk and reads the uploaded path directly.
  const runner: AnalysisRunner = {
    async run(request) {
      if (!storageKey) {
        return analysisRunner.run(request);
      }

      console.log(`[${taskId}] 📥 Downloading ${storageKey}...`);
      const content = await downloadFile(storageKey);
      const saved = await saveUpload(uploadDir, payload.fileName, content);
      localPath = saved.filePath;
      console.log(`[${taskId}] ✓ Downloaded to ${localPath}`);

      return analysisRunner.run({ ...request, filePath: localPath });
    },
  };

  try {
    const output = await executeAnalysis(payload, {
      resultStore: deps.resultStore ?? new PostgresResultStore(getDb()),
      runner,
      reportProgress: detail => {
        metadata.set("progress", detail);
      },
    });

    console.log(`[${taskId}] ✅ ANALYSIS COMPLETED (id: ${output.analysisId})`);
    return output;
  } catch (error) {
    if (error instanceof AnalysisTaskError && error.analysisId !== null) {
      metadata.set("analysisId", error.analysisId);
    }
    console.log(`[${taskId}] ❌ ANALYSIS FAILED`);
    throw error;
  } finally {
    await removeUpload(localPath);
    if (storageKey) {
      try {
        await deleteFile(storageKey);
      } catch (error) {
        console.error(
          `[${taskId}] Failed to delete ${storageKey} from storage:`,
          error
        );
      }
    }
    try {
      await flushLangfuseTracing();
    } catch (error) {
      console.error(`[${taskId}] Failed to flush Langfuse spans:`, error);
    }
  }
}

export const analyzeDocument = task({
  id: "analyze-document",
  queue: {
    concurrencyLimit: 5, // Max 5 analyses running simultaneously
  },
  retry: {
    maxAttempts: 1, // A failed analysis stays failed; callers re-enqueue
  },
  run: (payload: AnalysisTaskPayload) => runAnalyzeDocument(payload),
});
