/**
 * Multi-provider chat model factory.
 *
 * Selects the LangChain chat model class from the `provider:model`
 * naming convention.
 *
 * Two code paths:
 *   1. **Custom endpoint** (`baseUrl` is set) → `ChatOpenAI` with custom
 *      `configuration.baseURL`. Supports vLLM, Ollama, LiteLLM, and any
 *      other OpenAI-compatible API.
 *   2. **Standard provider** (no `baseUrl`) → `initChatModel` from
 *      `langchain`, which resolves the provider from the `provider:model`
 *      string and instantiates the matching class. Provider packages other
 *      than `@langchain/openai` must be installed separately.
 *
 * Rate limiting is not configured here; it lives in the model client
 * that wraps the returned model (see `structured-model.ts`).
 */

import { initChatModel } from "langchain";
import { ChatOpenAI } from "@langchain/openai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { ScopeResearchConfig } from "./scope-research/configuration";

// ---------------------------------------------------------------------------
// Provider prefix parsing
// ---------------------------------------------------------------------------

/**
 * Extract the provider prefix from a `provider:model` string.
 *
 * @returns The provider portion (lowercased), or `"openai"` when there is no prefix.
 *
 * @example
 *   extractProvider("anthropic:claude-sonnet-4-0") // → "anthropic"
 *   extractProvider("gpt-4.1")                     // → "openai"
 */
export function extractProvider(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return "openai";
  }
  return modelName.slice(0, colonIndex).toLowerCase();
}

/**
 * Extract the model name from a `provider:model` string.
 *
 * @example
 *   extractModelName("openai:gpt-4.1") // → "gpt-4.1"
 *   extractModelName("gpt-4.1-mini")   // → "gpt-4.1-mini"
 *   extractModelName("custom:")        // → ""
 */
export function extractModelName(modelName: string): string {
  const colonIndex = modelName.indexOf(":");
  if (colonIndex === -1) {
    return modelName;
  }
  return modelName.slice(colonIndex + 1);
}

// ---------------------------------------------------------------------------
// API key resolution
// ---------------------------------------------------------------------------

const PROVIDER_TO_ENV_VAR: Record<string, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_API_KEY",
};

/**
 * Resolve the API key for a custom OpenAI-compatible endpoint.
 *
 * Resolution order: the parsed `customApiKey`, then `CUSTOM_API_KEY`,
 * then `"EMPTY"` (local endpoints without auth).
 */
export function getCustomApiKey(config: Pick<ScopeResearchConfig, "customApiKey">): string {
  if (config.customApiKey) {
    return config.customApiKey;
  }
  const envKey = process.env.CUSTOM_API_KEY;
  if (envKey && envKey.length > 0) {
    return envKey;
  }
  return "EMPTY";
}

/**
 * Resolve the API key for a standard model provider.
 *
 * Resolution order: the `apiKeys` dict in the configurable (keys injected
 * per request), then the provider's environment variable.
 *
 * @returns The API key, or `undefined` if none is found or the provider
 *   is unknown.
 */
export function getApiKeyForProvider(
  provider: string,
  rawConfigurable: Record<string, unknown>,
): string | undefined {
  const envVarName = PROVIDER_TO_ENV_VAR[provider];
  if (!envVarName) {
    return undefined;
  }

  const apiKeys = rawConfigurable.apiKeys;
  if (typeof apiKeys === "object" && apiKeys !== null && !Array.isArray(apiKeys)) {
    const keyFromConfig: unknown = Reflect.get(apiKeys, envVarName);
    if (typeof keyFromConfig === "string" && keyFromConfig.length > 0) {
      return keyFromConfig;
    }
  }

  const envValue = process.env[envVarName];
  if (envValue && envValue.length > 0) {
    return envValue;
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Chat model factory
// ---------------------------------------------------------------------------

/**
 * Create a chat model for the parsed scoping configuration.
 *
 * @param config - Parsed graph configuration.
 * @param rawConfigurable - The raw configurable dict, for `apiKeys` lookup.
 *
 * @example
 *   const model = await createChatModel(parseScopeConfig({}), {});
 *
 *   // Custom vLLM endpoint
 *   const model = await createChatModel(
 *     parseScopeConfig({
 *       base_url: "http://localhost:7374/v1",
 *       custom_model_name: "local",
 *       custom_api_key: "test-key",
 *     }),
 *     {},
 *   );
 */
export async function createChatModel(
  config: ScopeResearchConfig,
  rawConfigurable: Record<string, unknown>,
): Promise<BaseChatModel> {
  const maxTokens = config.maxTokens ?? undefined;

  // ── Custom endpoint ────────────────────────────────────────────────
  if (config.baseUrl) {
    const apiKey = getCustomApiKey(config);
    const modelName = extractModelName(config.customModelName ?? config.modelName);

    console.info(
      `[providers] Custom endpoint: base_url=${maskUrl(config.baseUrl)} model=${modelName}`,
    );

    return new ChatOpenAI({
      configuration: { baseURL: config.baseUrl },
      apiKey,
      model: modelName,
      temperature: config.temperature,
      maxTokens,
    });
  }

  // ── Standard provider via initChatModel ────────────────────────────
  const provider = extractProvider(config.modelName);
  const apiKey = getApiKeyForProvider(provider, rawConfigurable);

  console.info(
    `[providers] Standard provider: provider=${provider} model=${config.modelName} api_key_present=${Boolean(apiKey)}`,
  );

  return initChatModel(config.modelName, {
    temperature: config.temperature,
    maxTokens,
    ...(apiKey ? { apiKey } : {}),
  });
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Mask a URL for logging: keep scheme and host, hide path and query. */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}/***`;
  } catch {
    return "***";
  }
}
