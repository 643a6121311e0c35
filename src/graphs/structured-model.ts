/**
 * Schema-constrained model calls.
 *
 * Graph nodes never talk to a chat model directly. They receive a
 * {@link ScopeModelClient}, built once per graph, which:
 *
 * 1. waits on the shared request rate limiter,
 * 2. asks the {@link StructuredOutputProvider} for output matching a schema,
 * 3. validates the payload and maps it onto the node's result type,
 *    throwing {@link StructuredOutputError} on any mismatch.
 *
 * Errors from the provider itself (network, timeout, quota) are not
 * caught here and reach the graph caller unchanged.
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { BaseMessage } from "@langchain/core/messages";
import type { RunnableConfig } from "@langchain/core/runnables";
import type { z } from "zod";

import type { RequestRateLimiter } from "../infra/rate-limiter";
import { StructuredOutputError, type SchemaIssue } from "../models/errors";

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

/**
 * A structured output request: the schema the model must fill and how the
 * validated payload becomes the caller's result.
 */
export interface StructuredOutputSpec<TPayload extends Record<string, unknown>, TOutput> {
  /** Function/schema name shown to the model. */
  name: string;
  schema: z.ZodType<TPayload>;
  transform: (payload: TPayload) => TOutput;
}

/** What a provider got back, before validation. */
export interface StructuredReply {
  /** Parsed payload, or `null` when the reply could not be parsed at all. */
  parsed: unknown;
  /** Raw reply text, when available. */
  raw: string | null;
  /** Why parsing failed, when `parsed` is `null`. */
  parsingError?: unknown;
}

/** The external structured-output call. */
export interface StructuredOutputProvider {
  requestStructured(
    request: { name: string; schema: z.ZodTypeAny },
    messages: BaseMessage[],
    config?: RunnableConfig,
  ): Promise<StructuredReply>;
}

// ---------------------------------------------------------------------------
// LangChain chat model provider
// ---------------------------------------------------------------------------

/**
 * Adapt a LangChain chat model to {@link StructuredOutputProvider}.
 *
 * Uses `withStructuredOutput(..., { includeRaw: true })` so that a reply
 * the integration cannot parse comes back as data instead of an
 * exception, and can be reported as a {@link StructuredOutputError}.
 */
export function chatModelProvider(model: BaseChatModel): StructuredOutputProvider {
  return {
    async requestStructured(request, messages, config) {
      const structured = model.withStructuredOutput<Record<string, unknown>>(request.schema, {
        name: request.name,
        includeRaw: true,
      });
      const result = await structured.invoke(messages, config);
      return {
        parsed: result.parsed ?? null,
        raw: result.raw.text || null,
        parsingError: "parsingError" in result ? result.parsingError : undefined,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Validate a provider reply against `spec` and map it to the result type.
 *
 * @throws StructuredOutputError when the reply is unparsed or invalid.
 */
export function parseStructuredOutput<TPayload extends Record<string, unknown>, TOutput>(
  spec: StructuredOutputSpec<TPayload, TOutput>,
  reply: StructuredReply,
): TOutput {
  if (reply.parsed === null || reply.parsed === undefined) {
    const message =
      reply.parsingError instanceof Error
        ? reply.parsingError.message
        : "model reply could not be parsed";
    throw new StructuredOutputError(spec.name, [{ path: "", message }], reply.raw, {
      cause: reply.parsingError,
    });
  }

  const result = spec.schema.safeParse(reply.parsed);
  if (!result.success) {
    const issues: SchemaIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new StructuredOutputError(spec.name, issues, reply.raw, { cause: result.error });
  }

  return spec.transform(result.data);
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * The model client threaded through the scoping nodes.
 *
 * Construct one per graph build; it owns no global state.
 */
export class ScopeModelClient {
  constructor(
    private readonly provider: StructuredOutputProvider,
    private readonly rateLimiter: RequestRateLimiter | null = null,
  ) {}

  async invokeStructured<TPayload extends Record<string, unknown>, TOutput>(
    spec: StructuredOutputSpec<TPayload, TOutput>,
    messages: BaseMessage[],
    config?: RunnableConfig,
  ): Promise<TOutput> {
    if (this.rateLimiter !== null) {
      await this.rateLimiter.acquire();
    }
    const reply = await this.provider.requestStructured(
      { name: spec.name, schema: spec.schema },
      messages,
      config,
    );
    return parseStructuredOutput(spec, reply);
  }
}
