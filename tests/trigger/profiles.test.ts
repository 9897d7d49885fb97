import { describe, expect, it } from "vitest";
import {
  ANALYSIS_PROFILES,
  buildSystemPrompt,
  getProfile,
  isAnalysisType,
} from "../../trigger/profiles";
import { ANALYSIS_TYPES } from "../../trigger/types";

describe("analysis profiles", () => {
  it("defines a profile for every analysis type", () => {
    for (const type of ANALYSIS_TYPES) {
      const profile = getProfile(type);
      expect(profile.type).toBe(type);
      expect(profile.defaultQuery).not.toBe("");
      expect(profile.allowedTools).toContain("read_document");
    }
    expect(Object.keys(ANALYSIS_PROFILES)).toHaveLength(ANALYSIS_TYPES.length);
  });

  it("recognises only the known analysis types", () => {
    expect(isAnalysisType("verification")).toBe(true);
    expect(isAnalysisType("diagnosis")).toBe(false);
    expect(isAnalysisType("Summary")).toBe(false);
  });

  it("builds the system prompt from the persona fields", () => {
    const profile = getProfile("exercise");
    const prompt = buildSystemPrompt(profile, "Can I run a marathon?");

    expect(prompt.split("\n")).toEqual([
      "Role: Exercise physiologist",
      "Goal: Propose an activity plan that fits the report and answer: Can I run a marathon?",
      `Background: ${profile.backstory}`,
      "Write a clear narrative answer for the person who uploaded the document.",
    ]);
  });
});
