/**
 * Typed environment configuration for the research scoping graph.
 *
 * All process-level configuration is read from environment variables with
 * defaults. Secrets (API keys) are never logged or put in error messages.
 *
 * The version is read from `package.json`; never hardcode it elsewhere.
 */

// Import tracing early so LANGCHAIN_TRACING_V2 is set before any
// LangChain code is loaded.
import "./infra/tracing";

import packageJson from "../package.json";

/** Current package version. Derived from `package.json`. */
export const VERSION: string = packageJson.version;

/** Service identifier used in logs and trace tags. */
export const SERVICE_NAME = "research-scope";

/**
 * Parsed environment configuration.
 *
 * Produced by {@link loadConfig} for the runner, which uses it to pick
 * the default model and to decide whether to start tracing. The model
 * factory and the Langfuse SDK read their keys and base URL from the
 * environment themselves; per-request keys go in `configurable.apiKeys`.
 */
export interface AppConfig {
  /** OpenAI API key. Required for `openai:*` models. */
  openaiApiKey: string | undefined;

  /** Anthropic API key. Required for `anthropic:*` models. */
  anthropicApiKey: string | undefined;

  /** Google API key. Required for `google:*` models. */
  googleApiKey: string | undefined;

  /** Custom endpoint API key. Used for OpenAI-compatible endpoints. */
  customApiKey: string | undefined;

  /** Default `provider:model` used when the caller does not pick one. */
  modelName: string;

  /** Langfuse secret key. Enables tracing and prompt management with the public key. */
  langfuseSecretKey: string | undefined;

  /** Langfuse public key. */
  langfusePublicKey: string | undefined;

  /** Langfuse server URL. */
  langfuseBaseUrl: string;
}

export const DEFAULT_APP_MODEL_NAME = "openai:gpt-4.1";

/**
 * Load configuration from environment variables.
 *
 * A function rather than a constant so tests can pass their own env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    googleApiKey: env.GOOGLE_API_KEY || undefined,
    customApiKey: env.CUSTOM_API_KEY || undefined,
    modelName: env.MODEL_NAME || DEFAULT_APP_MODEL_NAME,
    langfuseSecretKey: env.LANGFUSE_SECRET_KEY || undefined,
    langfusePublicKey: env.LANGFUSE_PUBLIC_KEY || undefined,
    langfuseBaseUrl: env.LANGFUSE_BASE_URL || "https://cloud.langfuse.com",
  };
}

/** Whether any model provider key is present. */
export function isLlmConfigured(config: AppConfig): boolean {
  return Boolean(
    config.openaiApiKey ||
      config.anthropicApiKey ||
      config.googleApiKey ||
      config.customApiKey,
  );
}

/** Whether Langfuse tracing and prompt management can be enabled. */
export function isTracingConfigured(config: AppConfig): boolean {
  return Boolean(config.langfuseSecretKey && config.langfusePublicKey);
}
