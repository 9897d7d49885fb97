// ============================================================================
// TASK EXPORTS
// ============================================================================

export { analyzeDocument } from "../workflow";
export { cleanupStaleUploads } from "./cleanup-uploads";

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type {
  AnalysisTaskPayload,
  AnalysisTaskOutput,
  AnalysisType,
} from "../types/domain";
