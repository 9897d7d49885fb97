import { describe, expect, it } from "vitest";
import {
  MAX_HISTORY_LIMIT,
  clampHistoryLimit,
  summarizeAnalytics,
  toAnalysisRecord,
} from "../../trigger/utils/result-store";

describe("summarizeAnalytics", () => {
  it("reports a zero success rate for an empty store", () => {
    expect(summarizeAnalytics([])).toEqual({
      total: 0,
      byStatus: { completed: 0, failed: 0 },
      byType: { summary: 0, nutrition: 0, exercise: 0, verification: 0 },
      successRate: 0,
    });
  });

  it("folds grouped counts into totals", () => {
    const summary = summarizeAnalytics([
      { status: "completed", analysisType: "summary", count: 2 },
      { status: "completed", analysisType: "nutrition", count: 1 },
      { status: "failed", analysisType: "summary", count: 1 },
    ]);

    expect(summary).toEqual({
      total: 4,
      byStatus: { completed: 3, failed: 1 },
      byType: { summary: 3, nutrition: 1, exercise: 0, verification: 0 },
      successRate: 75,
    });
  });

  it("rounds the success rate to two decimals", () => {
    const summary = summarizeAnalytics([
      { status: "completed", analysisType: "exercise", count: 1 },
      { status: "failed", analysisType: "exercise", count: 2 },
    ]);

    expect(summary.successRate).toBe(33.33);
  });
});

describe("clampHistoryLimit", () => {
  it("defaults to the maximum", () => {
    expect(clampHistoryLimit()).toBe(MAX_HISTORY_LIMIT);
    expect(clampHistoryLimit(Number.NaN)).toBe(MAX_HISTORY_LIMIT);
  });

  it("keeps limits inside 1..100", () => {
    expect(clampHistoryLimit(0)).toBe(1);
    expect(clampHistoryLimit(25)).toBe(25);
    expect(clampHistoryLimit(500)).toBe(100);
  });
});

describe("toAnalysisRecord", () => {
  it("maps a database row onto a record", () => {
    const createdAt = new Date("2026-03-01T10:00:00Z");

    expect(
      toAnalysisRecord({
        id: 9,
        user_id: "user-1",
        file_name: "report.pdf",
        query: "Is this document a blood test report?",
        analysis_type: "verification",
        result: "Yes.",
        created_at: createdAt,
        processing_time: 1.25,
        status: "completed",
        content_hash: null,
      })
    ).toEqual({
      id: 9,
      userId: "user-1",
      fileName: "report.pdf",
      query: "Is this document a blood test report?",
      analysisType: "verification",
      result: "Yes.",
      createdAt,
      processingTime: 1.25,
      status: "completed",
      contentHash: null,
    });
  });
});
