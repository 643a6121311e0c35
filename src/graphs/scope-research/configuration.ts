/**
 * Configuration for the research scoping graph.
 *
 * Parsed from the `configurable` dict a caller passes to the graph
 * factory. Every key is accepted in snake_case (what LangGraph servers
 * send) and camelCase; snake_case wins when both are present.
 *
 * Besides the LLM settings shared with other LangGraph agents, the
 * scoping graph carries the outbound request-rate policy:
 *
 * - `requestsPerSecond` — sustained model-call rate.
 * - `checkEveryNSeconds` — how often a throttled call re-checks for a token.
 * - `maxBucketSize` — burst size after an idle period.
 */

import {
  DEFAULT_CHECK_EVERY_N_SECONDS,
  DEFAULT_MAX_BUCKET_SIZE,
  DEFAULT_REQUESTS_PER_SECOND,
} from "../../infra/rate-limiter";

// ---------------------------------------------------------------------------
// Main configuration
// ---------------------------------------------------------------------------

/** Full configuration for a scoping-graph build. Unknown keys are ignored. */
export interface ScopeResearchConfig {
  // LLM
  /** Fully-qualified `provider:model` string (e.g. `"openai:gpt-4.1"`). */
  modelName: string;
  /** Sampling temperature for both model calls. */
  temperature: number;
  /** Optional hard token limit per model call. */
  maxTokens: number | null;
  /** If set, routes model calls to this OpenAI-compatible endpoint. */
  baseUrl: string | null;
  /** Model name override when `baseUrl` is used (e.g. a vLLM deployment). */
  customModelName: string | null;
  /** API key for the custom endpoint. */
  customApiKey: string | null;

  // Rate limiting
  requestsPerSecond: number;
  checkEveryNSeconds: number;
  maxBucketSize: number;
}

// ---------------------------------------------------------------------------
// Default values
// ---------------------------------------------------------------------------

export const DEFAULT_MODEL_NAME = "openai:gpt-4.1";
export const DEFAULT_TEMPERATURE = 0.0;
export {
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_CHECK_EVERY_N_SECONDS,
  DEFAULT_MAX_BUCKET_SIZE,
};

const MAX_REQUESTS_PER_SECOND = 1000;
const MIN_CHECK_EVERY_N_SECONDS = 0.01;
const MAX_CHECK_EVERY_N_SECONDS = 10;

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function readNonEmptyString(
  raw: Record<string, unknown>,
  snakeKey: string,
  camelKey: string,
): string | null {
  const snake = raw[snakeKey];
  if (typeof snake === "string" && snake) return snake;
  const camel = raw[camelKey];
  if (typeof camel === "string" && camel) return camel;
  return null;
}

function readFiniteNumber(
  raw: Record<string, unknown>,
  snakeKey: string,
  camelKey: string,
): number | null {
  const snake = raw[snakeKey];
  if (typeof snake === "number" && Number.isFinite(snake)) return snake;
  const camel = raw[camelKey];
  if (typeof camel === "number" && Number.isFinite(camel)) return camel;
  return null;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a `configurable` dict into a validated config object.
 *
 * Out-of-range rate settings are clamped rather than rejected:
 * `requestsPerSecond` to (0, 1000] (non-positive values fall back to the
 * default), `checkEveryNSeconds` to [0.01, 10], `maxBucketSize` to an
 * integer ≥ 1.
 *
 * @example
 *   const config = parseScopeConfig({ model_name: "anthropic:claude-sonnet-4-0" });
 *   config.requestsPerSecond // → 8.3
 */
export function parseScopeConfig(
  configurable?: Record<string, unknown> | null,
): ScopeResearchConfig {
  const raw = configurable ?? {};

  const maxTokens = readFiniteNumber(raw, "max_tokens", "maxTokens");

  let requestsPerSecond = DEFAULT_REQUESTS_PER_SECOND;
  const rawRate = readFiniteNumber(raw, "requests_per_second", "requestsPerSecond");
  if (rawRate !== null && rawRate > 0) {
    requestsPerSecond = Math.min(MAX_REQUESTS_PER_SECOND, rawRate);
  }

  let checkEveryNSeconds = DEFAULT_CHECK_EVERY_N_SECONDS;
  const rawCheck = readFiniteNumber(raw, "check_every_n_seconds", "checkEveryNSeconds");
  if (rawCheck !== null) {
    checkEveryNSeconds = Math.max(
      MIN_CHECK_EVERY_N_SECONDS,
      Math.min(MAX_CHECK_EVERY_N_SECONDS, rawCheck),
    );
  }

  let maxBucketSize = DEFAULT_MAX_BUCKET_SIZE;
  const rawBucket = readFiniteNumber(raw, "max_bucket_size", "maxBucketSize");
  if (rawBucket !== null) {
    maxBucketSize = Math.max(1, Math.round(rawBucket));
  }

  return {
    modelName: readNonEmptyString(raw, "model_name", "modelName") ?? DEFAULT_MODEL_NAME,
    temperature: readFiniteNumber(raw, "temperature", "temperature") ?? DEFAULT_TEMPERATURE,
    maxTokens: maxTokens !== null && maxTokens > 0 ? Math.round(maxTokens) : null,
    baseUrl: readNonEmptyString(raw, "base_url", "baseUrl"),
    customModelName: readNonEmptyString(raw, "custom_model_name", "customModelName"),
    customApiKey: readNonEmptyString(raw, "custom_api_key", "customApiKey"),
    requestsPerSecond,
    checkEveryNSeconds,
    maxBucketSize,
  };
}
