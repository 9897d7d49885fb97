import { LangfuseClient } from "@langfuse/client";

// Create singleton client for prompt management
let langfuseClient: LangfuseClient | null = null;

export function isLangfuseConfigured(): boolean {
  return Boolean(
    process.env.LANGFUSE_SECRET_KEY &&
      process.env.LANGFUSE_PUBLIC_KEY &&
      process.env.LANGFUSE_BASE_URL
  );
}

/**
 * Get Langfuse client for prompt management
 */
export function getLangfuseClient() {
  if (!langfuseClient) {
    const secretKey = process.env.LANGFUSE_SECRET_KEY;
    const publicKey = process.env.LANGFUSE_PUBLIC_KEY;
    const baseUrl = process.env.LANGFUSE_BASE_URL;

    if (!secretKey || !publicKey || !baseUrl) {
      throw new Error(
        "LANGFUSE_SECRET_KEY, LANGFUSE_PUBLIC_KEY, and LANGFUSE_BASE_URL environment variables must be set"
      );
    }

    langfuseClient = new LangfuseClient({
      secretKey,
      publicKey,
      baseUrl,
    });
  }

  return langfuseClient;
}
