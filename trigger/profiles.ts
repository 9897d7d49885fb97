import { ANALYSIS_TYPES, type AnalysisType } from "./types/domain";

export type ProfileTool = "read_document";

export interface AnalysisProfile {
  type: AnalysisType;
  label: string;
  role: string;
  goal: string;
  backstory: string;
  defaultQuery: string;
  allowedTools: readonly ProfileTool[];
}

export const DEFAULT_ANALYSIS_TYPE: AnalysisType = "summary";

export const ANALYSIS_PROFILES = {
  summary: {
    type: "summary",
    label: "Summary",
    role: "Senior physician reviewing laboratory reports",
    goal: "Answer the patient's question about their report: {query}",
    backstory:
      "You have spent years explaining laboratory results to patients in plain language. " +
      "You point out values outside the reference range, say what they usually indicate, " +
      "and suggest which questions to bring to the next appointment.",
    defaultQuery: "Summarise my blood test report",
    allowedTools: ["read_document"],
  },
  nutrition: {
    type: "nutrition",
    label: "Nutrition",
    role: "Clinical nutritionist",
    goal: "Relate the report to diet and answer: {query}",
    backstory:
      "You translate laboratory markers into practical eating habits. " +
      "You prefer ordinary foods to supplements and say plainly when a marker has no dietary link.",
    defaultQuery: "What dietary changes does my blood test suggest?",
    allowedTools: ["read_document"],
  },
  exercise: {
    type: "exercise",
    label: "Exercise",
    role: "Exercise physiologist",
    goal: "Propose an activity plan that fits the report and answer: {query}",
    backstory:
      "You design training plans for people of every fitness level. " +
      "You look for markers that call for caution before recommending intensity.",
    defaultQuery: "Suggest an exercise plan based on my blood test",
    allowedTools: ["read_document"],
  },
  verification: {
    type: "verification",
    label: "Verification",
    role: "Medical records verifier",
    goal: "Check whether the document is a laboratory report and answer: {query}",
    backstory:
      "You have handled medical records for a long time. " +
      "You check for patient details, test names, units and reference ranges before accepting a document.",
    defaultQuery: "Is this document a blood test report?",
    allowedTools: ["read_document"],
  },
} as const satisfies Record<AnalysisType, AnalysisProfile>;

export function isAnalysisType(value: string): value is AnalysisType {
  return (ANALYSIS_TYPES as readonly string[]).includes(value);
}

export function getProfile(type: AnalysisType): AnalysisProfile {
  return ANALYSIS_PROFILES[type];
}

/**
 * Builds the system prompt for a profile from its persona fields.
 */
export function buildSystemPrompt(profile: AnalysisProfile, query: string): string {
  return [
    `Role: ${profile.role}`,
    `Goal: ${profile.goal.replace("{query}", query)}`,
    `Background: ${profile.backstory}`,
    "Write a clear narrative answer for the person who uploaded the document.",
  ].join("\n");
}
