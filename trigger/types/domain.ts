// ============================================================================
// DOMAIN TYPE DEFINITIONS
// ============================================================================

export const ANALYSIS_TYPES = [
  "summary",
  "nutrition",
  "exercise",
  "verification",
] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export type AnalysisStatus = "completed" | "failed";

/**
 * Everything a worker needs to run one analysis. The uploaded file has already
 * been validated and written to disk (or to object storage) by the API.
 */
export interface AnalysisTaskPayload {
  filePath: string; // Local path of the uploaded document
  fileName: string; // Original file name as uploaded
  query: string;
  analysisType: AnalysisType;
  userId: string;
  contentHash: string; // SHA-256 of the upload
  storageKey?: string; // Set when the upload was handed over through object storage
}

export interface AnalysisTaskOutput {
  status: "success";
  analysisId: number;
  processingTime: number; // seconds
}

// ============================================================================
// TASK STATUS
// ============================================================================

export type TaskState =
  | "pending"
  | "in-progress"
  | "succeeded"
  | "failed"
  | "unknown";

export interface TaskSnapshot {
  state: TaskState;
  progressDetail?: string;
  analysisId?: number;
  error?: string;
}

// ============================================================================
// RESULT STORE RECORDS
// ============================================================================

export interface NewAnalysisRecord {
  userId: string;
  fileName: string;
  query: string;
  analysisType: AnalysisType;
  result: string;
  processingTime: number;
  status: AnalysisStatus;
  contentHash: string | null;
}

export interface AnalysisRecord extends NewAnalysisRecord {
  id: number;
  createdAt: Date;
}

export interface UserRecord {
  id: number;
  userId: string;
  email: string;
  createdAt: Date;
  totalAnalyses: number;
}

export interface AnalyticsSummary {
  total: number;
  byStatus: Record<AnalysisStatus, number>;
  byType: Record<AnalysisType, number>;
  successRate: number; // percentage, two decimals
}
