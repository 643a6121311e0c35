/**
 * Tracing configuration for the research scoping graph.
 *
 * Handles Langfuse initialization and provides callback handlers for
 * LangChain/LangGraph invocations. Disables LangSmith tracing by default.
 *
 * This module should be imported early (e.g., from `config.ts`) so that
 * the `LANGCHAIN_TRACING_V2` environment variable is set before any
 * LangChain code reads it.
 *
 * Usage:
 *
 *   import { initializeLangfuse, injectTracing } from "./infra/tracing";
 *
 *   // At startup
 *   initializeLangfuse();
 *
 *   // Per invocation
 *   const tracedConfig = injectTracing(runnableConfig, {
 *     sessionId: threadId,
 *     traceName: "scope-research",
 *   });
 *   const result = await scopeGraph.invoke({ messages }, tracedConfig);
 *
 * Environment variables:
 *   LANGFUSE_SECRET_KEY  — Langfuse secret key (required for tracing).
 *   LANGFUSE_PUBLIC_KEY  — Langfuse public key (required for tracing).
 *   LANGFUSE_BASE_URL    — Langfuse host URL
 *       (default: "https://cloud.langfuse.com").
 *   LANGCHAIN_TRACING_V2 — Set to "true" to re-enable LangSmith
 *       (default: "false").
 */

import type { RunnableConfig } from "@langchain/core/runnables";
import type { Callbacks } from "@langchain/core/callbacks/manager";
import { CallbackHandler } from "@langfuse/langchain";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import { NodeSDK } from "@opentelemetry/sdk-node";

// LangSmith stays off unless explicitly requested.
if (!process.env.LANGCHAIN_TRACING_V2) {
  process.env.LANGCHAIN_TRACING_V2 = "false";
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options for per-invocation tracing injection. */
export interface InjectTracingOptions {
  /** Owner / user identity for trace attribution. */
  userId?: string;
  /** Thread ID or session identifier for grouping. */
  sessionId?: string;
  /** Human-readable name shown in the Langfuse UI. */
  traceName?: string;
  /** Freeform tags for filtering in the Langfuse dashboard. */
  tags?: string[];
}

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

let langfuseInitialized = false;

/** OpenTelemetry SDK exporting spans to Langfuse; set while initialized. */
let otelSdk: NodeSDK | null = null;

// ---------------------------------------------------------------------------
// Public helpers
// ---------------------------------------------------------------------------

/**
 * Return `true` if the required Langfuse env vars are present.
 *
 * Both `LANGFUSE_SECRET_KEY` and `LANGFUSE_PUBLIC_KEY` must be set
 * and non-empty.
 */
export function isLangfuseConfigured(): boolean {
  const secretKey = process.env.LANGFUSE_SECRET_KEY;
  const publicKey = process.env.LANGFUSE_PUBLIC_KEY;
  return Boolean(secretKey && publicKey);
}

/** Return `true` if Langfuse has been initialized. */
export function isLangfuseEnabled(): boolean {
  return langfuseInitialized;
}

/**
 * Initialize the Langfuse integration.
 *
 * Starts an OpenTelemetry SDK whose span processor ships traces to
 * Langfuse. Connection details are read from the `LANGFUSE_*` env vars.
 * When the keys are missing, tracing stays disabled and the graph runs
 * unchanged.
 *
 * @returns `true` if Langfuse was initialized, `false` otherwise.
 */
export function initializeLangfuse(): boolean {
  if (langfuseInitialized) {
    return true;
  }

  if (!isLangfuseConfigured()) {
    console.info(
      "[tracing] Langfuse not configured " +
        "(LANGFUSE_SECRET_KEY / LANGFUSE_PUBLIC_KEY not set); " +
        "tracing disabled",
    );
    return false;
  }

  try {
    const sdk = new NodeSDK({ spanProcessors: [new LangfuseSpanProcessor()] });
    sdk.start();
    otelSdk = sdk;
    langfuseInitialized = true;

    const baseUrl = process.env.LANGFUSE_BASE_URL || "https://cloud.langfuse.com";
    console.info(`[tracing] Langfuse tracing initialized; baseUrl=${baseUrl}`);
    return true;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[tracing] Failed to initialize Langfuse, tracing disabled: ${message}`);
    return false;
  }
}

/**
 * Flush pending spans and stop the OpenTelemetry SDK.
 *
 * A no-op when Langfuse was never initialized. Call from the process
 * shutdown path so the last traces are not lost.
 */
export async function shutdownLangfuse(): Promise<void> {
  if (!langfuseInitialized) {
    return;
  }

  const sdk = otelSdk;
  langfuseInitialized = false;
  otelSdk = null;

  if (sdk === null) {
    return;
  }

  try {
    await sdk.shutdown();
    console.info("[tracing] Langfuse tracing shut down");
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[tracing] Error shutting down Langfuse: ${message}`);
  }
}

/**
 * Create a Langfuse `CallbackHandler` for a single invocation.
 *
 * @returns A handler, or `null` if Langfuse is not initialized.
 */
export function getLangfuseCallbackHandler(
  options?: InjectTracingOptions,
): CallbackHandler | null {
  if (!langfuseInitialized) {
    return null;
  }

  return new CallbackHandler({
    userId: options?.userId,
    sessionId: options?.sessionId,
    tags: options?.tags,
  });
}

function appendCallback(
  existing: Callbacks | undefined,
  handler: CallbackHandler,
): Callbacks {
  if (existing === undefined) {
    return [handler];
  }
  if (Array.isArray(existing)) {
    return [...existing, handler];
  }
  return existing.copy([handler]);
}

/**
 * Augment a runnable config with Langfuse tracing.
 *
 * Returns the config unchanged when Langfuse is disabled, so it is safe
 * to call at every invocation point. Otherwise returns a new config with
 * a fresh handler appended to `callbacks`, the Langfuse attribution keys
 * merged into `metadata` and, if given, `runName` set to the trace name.
 *
 * @example
 *   const tracedConfig = injectTracing({ configurable: { thread_id } }, {
 *     sessionId: thread_id,
 *     traceName: "scope-research",
 *     tags: ["scoping"],
 *   });
 */
export function injectTracing(
  config: RunnableConfig,
  options?: InjectTracingOptions,
): RunnableConfig {
  const handler = getLangfuseCallbackHandler(options);
  if (handler === null) {
    return config;
  }

  const augmented: RunnableConfig = {
    ...config,
    callbacks: appendCallback(config.callbacks, handler),
  };

  const langfuseMetadata: Record<string, unknown> = {};
  if (options?.userId) {
    langfuseMetadata.langfuseUserId = options.userId;
  }
  if (options?.sessionId) {
    langfuseMetadata.langfuseSessionId = options.sessionId;
  }
  if (options?.tags) {
    langfuseMetadata.langfuseTags = options.tags;
  }
  if (Object.keys(langfuseMetadata).length > 0) {
    augmented.metadata = { ...(config.metadata ?? {}), ...langfuseMetadata };
  }

  if (options?.traceName) {
    augmented.runName = options.traceName;
  }

  return augmented;
}

// ---------------------------------------------------------------------------
// Reset helper (testing only)
// ---------------------------------------------------------------------------

/**
 * Reset module-level state for test isolation.
 *
 * Pass `enabled: true` to simulate an initialized integration without
 * starting the OpenTelemetry SDK.
 */
export function _resetTracingState(enabled = false): void {
  langfuseInitialized = enabled;
  otelSdk = null;
}
