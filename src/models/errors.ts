/**
 * Error types for the research scoping workflow.
 *
 * Only failures the workflow itself detects get a type here. Transport,
 * timeout and quota errors from the model provider are never wrapped:
 * they propagate to the caller exactly as the provider raised them.
 */

/**
 * Standard error response format.
 *
 * Mirrors the `{ "detail": "..." }` shape used by LangGraph-compatible
 * servers, so callers that expose the graph over HTTP can return it as-is.
 */
export interface ErrorResponse {
  detail: string;
  /** Machine-readable code, present for errors raised by this package. */
  code?: ScopeErrorCode;
}

/** Discriminator for {@link ScopeError} subclasses. */
export type ScopeErrorCode = "structured_output_invalid" | "invalid_input";

/** Base class for errors raised by the scoping workflow. */
export class ScopeError extends Error {
  readonly code: ScopeErrorCode;

  constructor(code: ScopeErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ScopeError";
    this.code = code;
  }
}

/** A single schema violation, flattened from the validator's issue list. */
export interface SchemaIssue {
  /** Dotted path to the offending field; empty for the root value. */
  path: string;
  message: string;
}

/**
 * The model returned output that does not satisfy the requested schema.
 *
 * Raised both when the provider integration could not parse the reply at
 * all and when the parsed payload fails validation.
 */
export class StructuredOutputError extends ScopeError {
  /** Name of the schema the model was asked to fill (e.g. `ClarifyWithUser`). */
  readonly schemaName: string;
  readonly issues: SchemaIssue[];
  /** Raw model text, when the provider returned one. */
  readonly rawOutput: string | null;

  constructor(
    schemaName: string,
    issues: SchemaIssue[],
    rawOutput: string | null = null,
    options?: ErrorOptions,
  ) {
    const summary =
      issues.length > 0
        ? issues
            .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
            .join("; ")
        : "no parseable output";
    super(
      "structured_output_invalid",
      `Model output does not match schema ${schemaName}: ${summary}`,
      options,
    );
    this.name = "StructuredOutputError";
    this.schemaName = schemaName;
    this.issues = issues;
    this.rawOutput = rawOutput;
  }
}

/** The caller handed the workflow input it cannot run on. */
export class InvalidInputError extends ScopeError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

/**
 * Convert any thrown value into an {@link ErrorResponse}.
 *
 * @example
 *   toErrorResponse(new InvalidInputError("messages must not be empty"))
 *   // → { detail: "messages must not be empty", code: "invalid_input" }
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ScopeError) {
    return { detail: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { detail: error.message };
  }
  return { detail: String(error) };
}
