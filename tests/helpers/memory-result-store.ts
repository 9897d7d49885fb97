import { ConflictError } from "../../trigger/errors";
import type {
  AnalysisRecord,
  AnalyticsSummary,
  NewAnalysisRecord,
  UserRecord,
} from "../../trigger/types";
import {
  clampHistoryLimit,
  summarizeAnalytics,
  type ResultStore,
} from "../../trigger/utils/result-store";

export class MemoryResultStore implements ResultStore {
  readonly records: AnalysisRecord[] = [];
  readonly users: UserRecord[] = [];
  failNextRecord = false;
  failAllRecords = false;
  healthy = true;

  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  async record(attempt: NewAnalysisRecord): Promise<AnalysisRecord> {
    if (this.failNextRecord || this.failAllRecords) {
      this.failNextRecord = false;
      throw new Error("database unavailable");
    }

    const record: AnalysisRecord = {
      ...attempt,
      id: this.records.length + 1,
      createdAt: this.clock(),
    };
    this.records.push(record);

    const user = this.users.find(item => item.userId === attempt.userId);
    if (user) {
      user.totalAnalyses += 1;
    }
    return record;
  }

  async getById(id: number): Promise<AnalysisRecord | null> {
    return this.records.find(record => record.id === id) ?? null;
  }

  async listByUser(userId: string, limit?: number): Promise<AnalysisRecord[]> {
    return this.records
      .filter(record => record.userId === userId)
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id
      )
      .slice(0, clampHistoryLimit(limit));
  }

  async aggregate(): Promise<AnalyticsSummary> {
    const counts = new Map<string, { status: string; analysisType: string; count: number }>();
    for (const record of this.records) {
      const key = `${record.status}:${record.analysisType}`;
      const group = counts.get(key) ?? {
        status: record.status,
        analysisType: record.analysisType,
        count: 0,
      };
      group.count += 1;
      counts.set(key, group);
    }
    return summarizeAnalytics([...counts.values()]);
  }

  async registerUser(userId: string, email: string): Promise<UserRecord> {
    if (this.users.some(user => user.userId === userId || user.email === email)) {
      throw new ConflictError(`User ${userId} or email ${email} is already registered`);
    }
    const user: UserRecord = {
      id: this.users.length + 1,
      userId,
      email,
      createdAt: this.clock(),
      totalAnalyses: 0,
    };
    this.users.push(user);
    return user;
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    return this.users.find(user => user.userId === userId) ?? null;
  }

  async ping(): Promise<boolean> {
    return this.healthy;
  }
}
