import { describe, expect, it } from "vitest";
import { createAnalysisRunner } from "../../trigger/analysis-runner";
import type { GenerationRequest } from "../../trigger/utils/claude";

describe("createAnalysisRunner", () => {
  it("passes the extracted text and profile to generation", async () => {
    const requests: GenerationRequest[] = [];
    const runner = createAnalysisRunner({
      extract: async filePath => `text of ${filePath}`,
      generate: async request => {
        requests.push(request);
        return "Your iron is low.";
      },
    });

    const result = await runner.run({
      analysisType: "nutrition",
      filePath: "/uploads/report.pdf",
      query: "What should I eat?",
    });

    expect(result).toBe("Your iron is low.");
    expect(requests).toHaveLength(1);
    expect(requests[0]?.profile.type).toBe("nutrition");
    expect(requests[0]?.documentText).toBe("text of /uploads/report.pdf");
    expect(requests[0]?.query).toBe("What should I eat?");
  });

  it("still generates when the document cannot be read", async () => {
    const runner = createAnalysisRunner({
      generate: async request => `saw: ${request.documentText}`,
    });

    const result = await runner.run({
      analysisType: "summary",
      filePath: "/nonexistent/analysis-tests/report.pdf",
      query: "Summarise my blood test report",
    });

    expect(
      result.startsWith(
        "saw: Error reading document at /nonexistent/analysis-tests/report.pdf:"
      )
    ).toBe(true);
  });

  it("propagates generation failures", async () => {
    const runner = createAnalysisRunner({
      extract: async () => "text",
      generate: async () => {
        throw new Error("model overloaded");
      },
    });

    await expect(
      runner.run({ analysisType: "summary", filePath: "/x.pdf", query: "q" })
    ).rejects.toThrow("model overloaded");
  });
});
