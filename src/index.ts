/**
 * research-scope — clarification and research-brief scoping for a
 * multi-agent research pipeline.
 */

export * from "./graphs/scope-research";
export {
  ScopeModelClient,
  chatModelProvider,
  parseStructuredOutput,
  type StructuredOutputProvider,
  type StructuredOutputSpec,
  type StructuredReply,
} from "./graphs/structured-model";
export { createChatModel, extractProvider, extractModelName } from "./graphs/providers";
export type { GraphFactory, GraphFactoryOptions } from "./graphs/types";
export {
  InMemoryRateLimiter,
  type RateLimiterOptions,
  type RequestRateLimiter,
} from "./infra/rate-limiter";
export { getPrompt, seedDefaultPrompts } from "./infra/prompts";
export { initializeLangfuse, shutdownLangfuse, injectTracing } from "./infra/tracing";
export {
  ScopeError,
  StructuredOutputError,
  InvalidInputError,
  toErrorResponse,
  type ErrorResponse,
  type SchemaIssue,
} from "./models/errors";
export { loadConfig, VERSION, type AppConfig } from "./config";
