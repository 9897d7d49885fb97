import type { AnalysisRunner } from "../../trigger/analysis-runner";
import type { AnalysisTaskPayload } from "../../trigger/types";

export function buildPayload(
  overrides: Partial<AnalysisTaskPayload> = {}
): AnalysisTaskPayload {
  return {
    filePath: "/tmp/analysis-tests/upload_test.pdf",
    fileName: "report.pdf",
    query: "Summarise my blood test report",
    analysisType: "summary",
    userId: "user-1",
    contentHash: "abc123",
    ...overrides,
  };
}

export function fixedRunner(result: string): AnalysisRunner {
  return {
    async run() {
      return result;
    },
  };
}

export function failingRunner(message: string): AnalysisRunner {
  return {
    async run() {
      throw new Error(message);
    },
  };
}

/**
 * A runner whose calls stay open until the test releases them.
 */
export function gatedRunner(): AnalysisRunner & {
  release(result: string): void;
  fail(message: string): void;
  readonly calls: number;
} {
  const waiting: Array<{
    resolve: (value: string) => void;
    reject: (error: Error) => void;
  }> = [];
  let calls = 0;

  return {
    run() {
      calls += 1;
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },
    release(result) {
      waiting.shift()?.resolve(result);
    },
    fail(message) {
      waiting.shift()?.reject(new Error(message));
    },
    get calls() {
      return calls;
    },
  };
}
