/**
 * Shared type definitions for the document analysis pipeline
 *
 * Import from here rather than reaching into types/domain directly.
 */

export { ANALYSIS_TYPES } from "./types/domain";
export type {
  AnalysisType,
  AnalysisStatus,
  AnalysisTaskPayload,
  AnalysisTaskOutput,
  TaskState,
  TaskSnapshot,
  NewAnalysisRecord,
  AnalysisRecord,
  UserRecord,
  AnalyticsSummary,
} from "./types/domain";
