import { ConflictError } from "../errors";
import { ANALYSIS_TYPES } from "../types/domain";
import type {
  AnalysisRecord,
  AnalysisStatus,
  AnalysisType,
  AnalyticsSummary,
  NewAnalysisRecord,
  UserRecord,
} from "../types/domain";
import type { Sql } from "./db";

export const MAX_HISTORY_LIMIT = 100;

export interface ResultStore {
  record(attempt: NewAnalysisRecord): Promise<AnalysisRecord>;
  getById(id: number): Promise<AnalysisRecord | null>;
  listByUser(userId: string, limit?: number): Promise<AnalysisRecord[]>;
  aggregate(): Promise<AnalyticsSummary>;
  registerUser(userId: string, email: string): Promise<UserRecord>;
  getUser(userId: string): Promise<UserRecord | null>;
  ping(): Promise<boolean>;
}

export function clampHistoryLimit(limit: number = MAX_HISTORY_LIMIT): number {
  if (!Number.isFinite(limit)) {
    return MAX_HISTORY_LIMIT;
  }
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_HISTORY_LIMIT);
}

export interface AnalyticsGroup {
  status: string;
  analysisType: string;
  count: number;
}

/**
 * Folds grouped row counts into totals. An empty ledger has a 0% success rate.
 */
export function summarizeAnalytics(groups: AnalyticsGroup[]): AnalyticsSummary {
  const byStatus: Record<AnalysisStatus, number> = { completed: 0, failed: 0 };
  const byType: Record<AnalysisType, number> = {
    summary: 0,
    nutrition: 0,
    exercise: 0,
    verification: 0,
  };
  let total = 0;

  for (const group of groups) {
    total += group.count;
    if (group.status === "completed" || group.status === "failed") {
      byStatus[group.status] += group.count;
    }
    if (isKnownType(group.analysisType)) {
      byType[group.analysisType] += group.count;
    }
  }

  const successRate =
    total === 0 ? 0 : Math.round((byStatus.completed / total) * 10000) / 100;

  return { total, byStatus, byType, successRate };
}

function isKnownType(value: string): value is AnalysisType {
  return (ANALYSIS_TYPES as readonly string[]).includes(value);
}

// ============================================================================
// POSTGRES IMPLEMENTATION
// ============================================================================

interface AnalysisRow {
  id: number;
  user_id: string;
  file_name: string;
  query: string;
  analysis_type: string;
  result: string;
  created_at: Date;
  processing_time: number;
  status: string;
  content_hash: string | null;
}

interface UserRow {
  id: number;
  user_id: string;
  email: string;
  created_at: Date;
  total_analyses: number;
}

export function toAnalysisRecord(row: AnalysisRow): AnalysisRecord {
  return {
    id: row.id,
    userId: row.user_id,
    fileName: row.file_name,
    query: row.query,
    analysisType: isKnownType(row.analysis_type) ? row.analysis_type : "summary",
    result: row.result,
    createdAt: row.created_at,
    processingTime: Number(row.processing_time),
    status: row.status === "failed" ? "failed" : "completed",
    contentHash: row.content_hash,
  };
}

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    userId: row.user_id,
    email: row.email,
    createdAt: row.created_at,
    totalAnalyses: row.total_analyses,
  };
}

export class PostgresResultStore implements ResultStore {
  constructor(private readonly sql: Sql) {}

  async record(attempt: NewAnalysisRecord): Promise<AnalysisRecord> {
    // Insert and counter bump run as one statement; the counter only moves
    // for users that already have a row.
    const [row] = await this.sql<AnalysisRow[]>`
      WITH inserted AS (
        INSERT INTO analysis_results (
          user_id,
          file_name,
          query,
          analysis_type,
          result,
          processing_time,
          status,
          content_hash
        ) VALUES (
          ${attempt.userId},
          ${attempt.fileName},
          ${attempt.query},
          ${attempt.analysisType},
          ${attempt.result},
          ${attempt.processingTime},
          ${attempt.status},
          ${attempt.contentHash}
        )
        RETURNING *
      ), counted AS (
        UPDATE users
        SET total_analyses = total_analyses + 1
        WHERE user_id = ${attempt.userId}
        RETURNING user_id
      )
      SELECT * FROM inserted
    `;

    if (!row) {
      throw new Error("Insert into analysis_results returned no row");
    }

    return toAnalysisRecord(row);
  }

  async getById(id: number): Promise<AnalysisRecord | null> {
    const [row] = await this.sql<AnalysisRow[]>`
      SELECT * FROM analysis_results WHERE id = ${id}
    `;
    return row ? toAnalysisRecord(row) : null;
  }

  async listByUser(userId: string, limit?: number): Promise<AnalysisRecord[]> {
    const rows = await this.sql<AnalysisRow[]>`
      SELECT *
      FROM analysis_results
      WHERE user_id = ${userId}
      ORDER BY created_at DESC, id DESC
      LIMIT ${clampHistoryLimit(limit)}
    `;
    return rows.map(toAnalysisRecord);
  }

  async aggregate(): Promise<AnalyticsSummary> {
    const rows = await this.sql<
      { status: string; analysis_type: string; count: number }[]
    >`
      SELECT status, analysis_type, COUNT(*)::int AS count
      FROM analysis_results
      GROUP BY status, analysis_type
    `;

    return summarizeAnalytics(
      rows.map(row => ({
        status: row.status,
        analysisType: row.analysis_type,
        count: row.count,
      }))
    );
  }

  async registerUser(userId: string, email: string): Promise<UserRecord> {
    const [row] = await this.sql<UserRow[]>`
      INSERT INTO users (user_id, email)
      VALUES (${userId}, ${email})
      ON CONFLICT DO NOTHING
      RETURNING *
    `;

    if (!row) {
      throw new ConflictError(`User ${userId} or email ${email} is already registered`);
    }

    return toUserRecord(row);
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    const [row] = await this.sql<UserRow[]>`
      SELECT * FROM users WHERE user_id = ${userId}
    `;
    return row ? toUserRecord(row) : null;
  }

  async ping(): Promise<boolean> {
    try {
      await this.sql`SELECT 1`;
      return true;
    } catch (error) {
      console.error("[result-store] Database ping failed:", error);
      return false;
    }
  }
}
