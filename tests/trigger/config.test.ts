import { describe, expect, it } from "vitest";
import { loadConfig } from "../../trigger/config";
import { ConfigurationError } from "../../trigger/errors";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.TASK_QUEUE_BACKEND).toBe("local");
    expect(config.WORKER_CONCURRENCY).toBe(2);
    expect(config.MAX_UPLOAD_BYTES).toBe(10 * 1024 * 1024);
    expect(config.UPLOAD_RETENTION_MS).toBe(60 * 60 * 1000);
    expect(config.UPLOAD_SWEEP_INTERVAL_MS).toBe(60 * 60 * 1000);
    expect(config.RATE_LIMIT_MAX).toBe(10);
    expect(config.RATE_LIMIT_WINDOW_MS).toBe(60_000);
  });

  it("coerces numeric settings from strings", () => {
    const config = loadConfig({
      PORT: "8080",
      TASK_QUEUE_BACKEND: "trigger",
      RATE_LIMIT_MAX: "3",
    });

    expect(config.PORT).toBe(8080);
    expect(config.TASK_QUEUE_BACKEND).toBe("trigger");
    expect(config.RATE_LIMIT_MAX).toBe(3);
  });

  it("rejects invalid values with a configuration error", () => {
    expect(() => loadConfig({ TASK_QUEUE_BACKEND: "redis" })).toThrow(
      ConfigurationError
    );
    expect(() => loadConfig({ WORKER_CONCURRENCY: "0" })).toThrow(
      /WORKER_CONCURRENCY/
    );
  });
});
