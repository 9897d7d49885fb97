import { describe, expect, it } from "vitest";
import { mapRunToSnapshot } from "../../trigger/queue/trigger-queue";

describe("mapRunToSnapshot", () => {
  it("treats queued and delayed runs as pending", () => {
    expect(mapRunToSnapshot({ status: "QUEUED" })).toEqual({ state: "pending" });
    expect(mapRunToSnapshot({ status: "DELAYED" })).toEqual({ state: "pending" });
  });

  it("carries the progress detail of an executing run", () => {
    expect(
      mapRunToSnapshot({
        status: "EXECUTING",
        metadata: { progress: "Saving analysis result..." },
      })
    ).toEqual({
      state: "in-progress",
      progressDetail: "Saving analysis result...",
    });
  });

  it("ignores progress metadata that is not a string", () => {
    expect(
      mapRunToSnapshot({ status: "EXECUTING", metadata: { progress: 42 } })
    ).toEqual({ state: "in-progress", progressDetail: undefined });
  });

  it("reads the analysis id from the output of a completed run", () => {
    expect(
      mapRunToSnapshot({
        status: "COMPLETED",
        output: { status: "success", analysisId: 12, processingTime: 3.2 },
      })
    ).toEqual({ state: "succeeded", analysisId: 12 });
  });

  it("reads the analysis id from metadata of a failed run", () => {
    expect(
      mapRunToSnapshot({
        status: "FAILED",
        error: { message: "model overloaded" },
        metadata: { analysisId: 5 },
      })
    ).toEqual({ state: "failed", analysisId: 5, error: "model overloaded" });
  });

  it("describes runs that ended without an error message", () => {
    expect(mapRunToSnapshot({ status: "CRASHED" })).toEqual({
      state: "failed",
      analysisId: undefined,
      error: "Run ended with status CRASHED",
    });
  });

  it("treats statuses it does not know as still running", () => {
    expect(mapRunToSnapshot({ status: "SOMETHING_NEW" })).toEqual({
      state: "in-progress",
      progressDetail: undefined,
    });
  });
});
