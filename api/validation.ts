import { randomUUID } from "node:crypto";
import { basename, extname } from "node:path";
import { z } from "zod";
import { ValidationError } from "../trigger/errors";
import {
  DEFAULT_ANALYSIS_TYPE,
  getProfile,
  isAnalysisType,
} from "../trigger/profiles";
import { ANALYSIS_TYPES, type AnalysisType } from "../trigger/types";

export const ALLOWED_EXTENSIONS: readonly string[] = [".pdf"];
export const MAX_QUERY_LENGTH = 1000;
export const MAX_USER_ID_LENGTH = 64;
export const MAX_FILE_NAME_LENGTH = 255;

const DENYLIST = /[<>"'`;\\]/g;
// Control characters other than tab and newline
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B-\u001F\u007F]/g;
const USER_ID_PATTERN = /^[A-Za-z0-9._@-]{1,64}$/;
const TASK_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function sanitizeText(value: string, maxLength: number): string {
  return value
    .replace(CONTROL_CHARACTERS, "")
    .replace(DENYLIST, "")
    .trim()
    .slice(0, maxLength)
    .trim();
}

export function resolveAnalysisType(raw: string | undefined): AnalysisType {
  const value = raw?.trim().toLowerCase() ?? "";
  if (value === "") {
    return DEFAULT_ANALYSIS_TYPE;
  }
  if (!isAnalysisType(value)) {
    throw new ValidationError(
      `Unsupported analysis_type "${sanitizeText(value, 40)}". Expected one of: ${ANALYSIS_TYPES.join(", ")}`
    );
  }
  return value;
}

export function resolveQuery(
  raw: string | undefined,
  analysisType: AnalysisType
): string {
  const query = sanitizeText(raw ?? "", MAX_QUERY_LENGTH);
  return query || getProfile(analysisType).defaultQuery;
}

export function validateUserId(raw: string): string {
  const userId = sanitizeText(raw, MAX_USER_ID_LENGTH);
  if (!USER_ID_PATTERN.test(userId)) {
    throw new ValidationError(
      "user_id may only contain letters, digits and . _ @ - (max 64 characters)"
    );
  }
  return userId;
}

/**
 * Callers without a user id get a generated anonymous one, which is returned
 * to them so their history stays reachable.
 */
export function resolveUserId(raw: string | undefined): string {
  if (raw === undefined || raw.trim() === "") {
    return `anon_${randomUUID()}`;
  }
  return validateUserId(raw);
}

export function isValidTaskId(taskId: string): boolean {
  return TASK_ID_PATTERN.test(taskId);
}

export interface UploadedFile {
  originalname: string;
  size: number;
  buffer: Buffer;
}

export function validateUpload(file: UploadedFile | undefined): {
  fileName: string;
  content: Buffer;
} {
  if (!file) {
    throw new ValidationError("A file upload is required (field \"file\")");
  }

  const fileName = sanitizeText(basename(file.originalname), MAX_FILE_NAME_LENGTH);
  if (!fileName) {
    throw new ValidationError("Uploaded file has no name");
  }

  const extension = extname(fileName).toLowerCase();
  if (!ALLOWED_EXTENSIONS.includes(extension)) {
    throw new ValidationError(
      `Unsupported file type "${extension || "(none)"}". Allowed: ${ALLOWED_EXTENSIONS.join(", ")}`
    );
  }

  if (file.size === 0 || file.buffer.length === 0) {
    throw new ValidationError("Uploaded file is empty");
  }

  return { fileName, content: file.buffer };
}

const analyzeFormSchema = z.object({
  query: z.string().optional(),
  analysis_type: z.string().optional(),
  user_id: z.string().optional(),
});

export interface AnalyzeInput {
  fileName: string;
  content: Buffer;
  query: string;
  analysisType: AnalysisType;
  userId: string;
}

export function parseAnalyzeRequest(
  body: unknown,
  file: UploadedFile | undefined
): AnalyzeInput {
  const parsed = analyzeFormSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid form fields: ${parsed.error.issues.map(issue => issue.path.join(".")).join(", ")}`
    );
  }

  const { fileName, content } = validateUpload(file);
  const analysisType = resolveAnalysisType(parsed.data.analysis_type);

  return {
    fileName,
    content,
    query: resolveQuery(parsed.data.query, analysisType),
    analysisType,
    userId: resolveUserId(parsed.data.user_id),
  };
}

const registerUserSchema = z.object({
  user_id: z.string(),
  email: z.string().email().max(254),
});

export function parseRegisterUserRequest(body: unknown): {
  userId: string;
  email: string;
} {
  const parsed = registerUserSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid user payload: ${parsed.error.issues.map(issue => issue.path.join(".")).join(", ")}`
    );
  }

  return {
    userId: validateUserId(parsed.data.user_id),
    email: parsed.data.email.toLowerCase(),
  };
}

export function parseHistoryLimit(raw: unknown): number | undefined {
  if (typeof raw !== "string" || raw.trim() === "") {
    return undefined;
  }
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError("limit must be a positive integer");
  }
  return limit;
}
