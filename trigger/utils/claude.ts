import Anthropic from "@anthropic-ai/sdk";
import { startObservation } from "@langfuse/tracing";
import { getConfig } from "../config";
import { errorMessage } from "../errors";
import { buildSystemPrompt, type AnalysisProfile } from "../profiles";
import { getLangfuseClient, isLangfuseConfigured } from "./langfuse";

type LangfusePromptAttributes = {
  name: string;
  version: number;
  isFallback: boolean;
};

type PromptConfig = {
  model?: string;
  max_tokens?: number;
  temperature?: number;
};

type ResolvedPrompt = {
  name: string;
  text: string;
  config: PromptConfig;
  attributes?: LangfusePromptAttributes;
};

export interface GenerationRequest {
  profile: AnalysisProfile;
  documentText: string;
  query: string;
}

function toLangfusePromptAttributes(prompt: {
  name: string;
  version: number;
  isFallback?: boolean;
  labels?: string[];
}): LangfusePromptAttributes {
  const inferredFallback = Array.isArray(prompt.labels)
    ? prompt.labels.includes("fallback")
    : false;

  return {
    name: prompt.name,
    version: prompt.version,
    isFallback:
      typeof prompt.isFallback === "boolean"
        ? prompt.isFallback
        : inferredFallback,
  };
}

function readPromptConfig(config: unknown): PromptConfig {
  if (typeof config !== "object" || config === null) {
    return {};
  }

  const result: PromptConfig = {};
  if ("model" in config && typeof config.model === "string") {
    result.model = config.model;
  }
  if ("max_tokens" in config && typeof config.max_tokens === "number") {
    result.max_tokens = config.max_tokens;
  }
  if ("temperature" in config && typeof config.temperature === "number") {
    result.temperature = config.temperature;
  }
  return result;
}

// Create a singleton Anthropic client
let claudeClient: Anthropic | null = null;

export function getClaudeClient() {
  if (!claudeClient) {
    const apiKey = process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new Error("ANTHROPIC_API_KEY environment variable is not set");
    }

    claudeClient = new Anthropic({
      apiKey: apiKey,
    });
  }

  return claudeClient;
}

/**
 * Prompts are managed in Langfuse as `analysis/<type>` with a `{{query}}`
 * placeholder. Without Langfuse, or when the fetch fails, the persona built
 * into the profile is used.
 */
export async function resolvePrompt(
  profile: AnalysisProfile,
  query: string
): Promise<ResolvedPrompt> {
  const promptName = `analysis/${profile.type}`;
  const localPrompt: ResolvedPrompt = {
    name: `local/${profile.type}`,
    text: buildSystemPrompt(profile, query),
    config: {},
  };

  if (!isLangfuseConfigured()) {
    return localPrompt;
  }

  try {
    const langfusePrompt = await getLangfuseClient().prompt.get(promptName);
    return {
      name: promptName,
      text: langfusePrompt.compile({ query }),
      config: readPromptConfig(langfusePrompt.config),
      attributes: toLangfusePromptAttributes(langfusePrompt),
    };
  } catch (error) {
    console.error(
      `[generate-analysis] Failed to fetch prompt "${promptName}", using built-in persona:`,
      error
    );
    return localPrompt;
  }
}

function buildUserMessage(request: GenerationRequest): string {
  const { profile, documentText, query } = request;

  if (!profile.allowedTools.includes("read_document")) {
    return query;
  }

  return [
    "<document>",
    documentText,
    "</document>",
    "",
    `Question: ${query}`,
  ].join("\n");
}

/**
 * Generate the narrative analysis for one profile using Claude
 */
export async function generateAnalysis(
  request: GenerationRequest
): Promise<string> {
  const client = getClaudeClient();
  const serviceConfig = getConfig();
  const prompt = await resolvePrompt(request.profile, request.query);

  const model = prompt.config.model || serviceConfig.ANTHROPIC_MODEL;
  const maxTokens =
    prompt.config.max_tokens || serviceConfig.ANTHROPIC_MAX_TOKENS;
  const temperature = prompt.config.temperature ?? 0.7;
  const userMessage = buildUserMessage(request);

  const generation = startObservation(
    "generate-analysis",
    {
      model,
      input: { system: prompt.text, user: userMessage },
      modelParameters: { maxTokens, temperature },
      metadata: {
        promptName: prompt.name,
        analysisType: request.profile.type,
      },
      prompt: prompt.attributes,
    },
    { asType: "generation" }
  );

  try {
    const response = await client.messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      system: prompt.text,
      messages: [
        {
          role: "user",
          content: userMessage,
        },
      ],
    });

    generation.update({
      output: response.content,
      usageDetails: {
        input: response.usage.input_tokens,
        output: response.usage.output_tokens,
      },
      metadata: {
        stopReason: response.stop_reason,
      },
    });

    generation.end();

    const textContent = response.content.find(block => block.type === "text");
    if (!textContent || textContent.type !== "text") {
      throw new Error("No text response from Claude");
    }

    return textContent.text.trim();
  } catch (error) {
    generation.update({
      level: "ERROR",
      statusMessage: errorMessage(error),
    });
    generation.end();
    throw error;
  }
}
