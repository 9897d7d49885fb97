import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
} from "express";
import multer from "multer";
import {
  AnalysisServiceError,
  ConflictError,
  NotFoundError,
  PayloadTooLargeError,
  RateLimitError,
  ValidationError,
  errorMessage,
} from "../trigger/errors";
import type { AnalysisRecord, AnalyticsSummary } from "../trigger/types";
import type { RateLimiter } from "./rate-limiter";
import type { AnalysisService, TaskStatusView } from "./service";
import {
  isValidTaskId,
  MAX_USER_ID_LENGTH,
  parseAnalyzeRequest,
  parseHistoryLimit,
  parseRegisterUserRequest,
  sanitizeText,
  validateUserId,
} from "./validation";

export interface AppDependencies {
  service: AnalysisService;
  rateLimiter: RateLimiter;
  maxUploadBytes: number;
}

const SERVICE_BANNER = "Document Analysis API is running";

// ============================================================================
// RESPONSE SERIALIZERS
// ============================================================================

function serializeStatus(taskId: string, view: TaskStatusView) {
  switch (view.state) {
    case "pending":
    case "unknown":
      return { task_id: taskId, state: view.state };
    case "in-progress":
      return {
        task_id: taskId,
        state: view.state,
        progress_detail: view.progressDetail,
      };
    case "succeeded":
      return {
        task_id: taskId,
        state: view.state,
        result: view.result,
        analysis_id: view.analysisId,
      };
    case "failed":
      return {
        task_id: taskId,
        state: view.state,
        error: view.error,
        analysis_id: view.analysisId,
      };
  }
}

function serializeHistoryItem(record: AnalysisRecord) {
  return {
    id: record.id,
    file_name: record.fileName,
    query: record.query,
    analysis_type: record.analysisType,
    status: record.status,
    created_at: record.createdAt.toISOString(),
    processing_time: record.processingTime,
  };
}

function serializeAnalytics(summary: AnalyticsSummary) {
  return {
    total_analyses: summary.total,
    completed: summary.byStatus.completed,
    failed: summary.byStatus.failed,
    success_rate: summary.successRate,
    by_status: summary.byStatus,
    by_type: summary.byType,
  };
}

// ============================================================================
// MIDDLEWARE
// ============================================================================

function callerKey(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "user_id" in body) {
    const userId = body.user_id;
    if (typeof userId === "string" && userId.trim() !== "") {
      return `user:${sanitizeText(userId, MAX_USER_ID_LENGTH)}`;
    }
  }
  return `ip:${req.ip ?? req.socket.remoteAddress ?? "unknown"}`;
}

function rateLimit(limiter: RateLimiter): RequestHandler {
  return async (req, res, next) => {
    const decision = await limiter.consume(callerKey(req));
    res.setHeader("X-RateLimit-Remaining", String(decision.remaining));

    if (!decision.allowed) {
      throw new RateLimitError(
        "Rate limit exceeded, try again later",
        decision.retryAfterMs
      );
    }
    next();
  };
}

function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConflictError) return 409;
  if (error instanceof PayloadTooLargeError) return 413;
  if (error instanceof RateLimitError) return 429;
  if (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return 500;
}

const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  let normalized = error;
  if (error instanceof multer.MulterError) {
    normalized =
      error.code === "LIMIT_FILE_SIZE"
        ? new PayloadTooLargeError("Uploaded file exceeds the size limit")
        : new ValidationError(`Upload rejected: ${error.message}`);
  }

  const status = statusFor(normalized);

  if (normalized instanceof RateLimitError) {
    res.setHeader(
      "Retry-After",
      String(Math.max(1, Math.ceil(normalized.retryAfterMs / 1000)))
    );
  }

  if (status >= 500) {
    console.error(`[api] ${req.method} ${req.path} failed:`, error);
    res.status(status).json({ error: "Internal server error" });
    return;
  }

  res.status(status).json({
    error: errorMessage(normalized),
    code:
      normalized instanceof AnalysisServiceError ? normalized.code : undefined,
  });
};

// ============================================================================
// APPLICATION
// ============================================================================

export function createApp(deps: AppDependencies): Express {
  const { service } = deps;
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  });
  const limit = rateLimit(deps.rateLimiter);

  app.get("/", (_req, res) => {
    res.json({ message: SERVICE_BANNER });
  });

  app.post("/analyze", upload.single("file"), limit, async (req, res) => {
    const input = parseAnalyzeRequest(req.body, req.file);
    const submitted = await service.submit(input);

    res.status(202).json({
      status: "processing",
      task_id: submitted.taskId,
      query: input.query,
      analysis_type: input.analysisType,
      file_processed: input.fileName,
      user_id: input.userId,
      content_hash: submitted.contentHash,
    });
  });

  app.post("/analyze/sync", upload.single("file"), limit, async (req, res) => {
    const input = parseAnalyzeRequest(req.body, req.file);
    const outcome = await service.runSync(input);

    if (outcome.status === "error") {
      res.status(500).json({
        status: "error",
        detail: outcome.detail,
        analysis_id: outcome.analysisId,
      });
      return;
    }

    res.json({
      status: "success",
      query: input.query,
      analysis_type: input.analysisType,
      creative_analysis: outcome.result,
      file_processed: input.fileName,
      analysis_id: outcome.analysisId,
      user_id: input.userId,
      processing_time: outcome.processingTime,
    });
  });

  app.get("/status/:taskId", async (req, res) => {
    const { taskId } = req.params;
    if (!isValidTaskId(taskId)) {
      res.json({ task_id: sanitizeText(taskId, 128), state: "unknown" });
      return;
    }

    const view = await service.getTaskStatus(taskId);
    res.json(serializeStatus(taskId, view));
  });

  app.get("/history/:userId", async (req, res) => {
    const userId = validateUserId(req.params.userId);
    const records = await service.history(userId, parseHistoryLimit(req.query.limit));

    res.json({
      user_id: userId,
      count: records.length,
      analyses: records.map(serializeHistoryItem),
    });
  });

  app.get("/analytics", async (_req, res) => {
    res.json(serializeAnalytics(await service.analytics()));
  });

  app.get("/health", async (_req, res) => {
    const report = await service.health();
    res.status(report.healthy ? 200 : 503).json({
      status: report.healthy ? "healthy" : "degraded",
      database: report.database ? "connected" : "unavailable",
      task_queue: report.taskQueue ? "connected" : "unavailable",
      backend: report.backend,
    });
  });

  app.post("/users", async (req, res) => {
    const { userId, email } = parseRegisterUserRequest(req.body);
    const user = await service.registerUser(userId, email);

    res.status(201).json({
      user_id: user.userId,
      email: user.email,
      total_analyses: user.totalAnalyses,
      created_at: user.createdAt.toISOString(),
    });
  });

  app.get("/users/:userId", async (req, res) => {
    const user = await service.getUser(validateUserId(req.params.userId));

    res.json({
      user_id: user.userId,
      email: user.email,
      total_analyses: user.totalAnalyses,
      created_at: user.createdAt.toISOString(),
    });
  });

  app.use(errorHandler);

  return app;
}
