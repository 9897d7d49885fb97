import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import { setLangfuseTracerProvider } from "@langfuse/tracing";
import { isLangfuseConfigured } from "./langfuse";

type LangfuseTracingState = {
  provider: NodeTracerProvider;
  processor: LangfuseSpanProcessor;
};

let state: LangfuseTracingState | undefined;

/**
 * Registers the Langfuse span processor. Returns undefined when the Langfuse
 * keys are not set; generations are then traced by a no-op tracer.
 */
export function initLangfuseTracing(): LangfuseTracingState | undefined {
  if (state) {
    return state;
  }

  if (!isLangfuseConfigured()) {
    console.log("[langfuse] Keys not configured, tracing disabled");
    return undefined;
  }

  const processor = new LangfuseSpanProcessor({
    publicKey: process.env.LANGFUSE_PUBLIC_KEY,
    secretKey: process.env.LANGFUSE_SECRET_KEY,
    baseUrl: process.env.LANGFUSE_BASE_URL,
    exportMode: "immediate",
  });

  const provider = new NodeTracerProvider({
    spanProcessors: [processor],
  });

  // Register provider only for Langfuse, to avoid interfering with Trigger.dev's tracer
  setLangfuseTracerProvider(provider);

  state = { provider, processor };

  process.once("beforeExit", () => {
    flushLangfuseTracing().catch(error => {
      console.error("Failed to flush Langfuse spans", error);
    });
  });

  return state;
}

export async function flushLangfuseTracing(): Promise<void> {
  if (!state) {
    return;
  }

  await state.processor.forceFlush();
}
