/**
 * Langfuse prompt management integration.
 *
 * Provides a thin wrapper around Langfuse's prompt fetching with:
 *
 * - **Automatic fallback** to hardcoded defaults when Langfuse is not
 *   configured or unreachable.
 * - **Runtime overrides** via `configurable.prompt_overrides`, which let a
 *   caller select a specific prompt name, label, or version at
 *   invocation time for A/B testing.
 * - **Caching** via the Langfuse SDK's built-in client-side cache.
 * - **Variable substitution** — replaces `{{variable}}` placeholders.
 *
 * Usage:
 *
 *   import { getPrompt } from "./infra/prompts";
 *
 *   const text = await getPrompt({
 *     name: "scope-research-clarify-with-user",
 *     fallback: CLARIFY_WITH_USER_PROMPT,
 *     config: runnableConfig,
 *     variables: { messages: transcript, date: today },
 *   });
 *
 * Runtime override (sent via configurable):
 *
 *   {
 *     "configurable": {
 *       "prompt_overrides": {
 *         "scope-research-clarify-with-user": { "label": "experiment-a" },
 *         "scope-research-write-research-brief": { "version": 5 }
 *       }
 *     }
 *   }
 *
 * Override keys:
 *   - `name`    — swap to a completely different Langfuse prompt
 *   - `label`   — fetch a different label (default: "production")
 *   - `version` — pin to an exact version number
 *
 * Environment variables:
 *   LANGFUSE_PROMPT_CACHE_TTL — Override the default cache TTL in seconds
 *     (default: 300). Set to 0 to disable caching.
 */

import type { RunnableConfig } from "@langchain/core/runnables";
import { LangfuseClient } from "@langfuse/client";

import { isLangfuseEnabled } from "./tracing";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options for {@link getPrompt}. */
export interface GetPromptOptions {
  /** Langfuse prompt name (e.g., "scope-research-clarify-with-user"). */
  name: string;
  /** Hardcoded fallback template. */
  fallback: string;
  /** Runnable config carrying `configurable.prompt_overrides`. */
  config?: RunnableConfig | null;
  /** Default Langfuse label. Default: "production". */
  label?: string;
  /** Override the SDK cache TTL for this call (in seconds). */
  cacheTtlSeconds?: number | null;
  /** `{{key}}` substitution values. */
  variables?: Record<string, string> | null;
}

/** Per-prompt selection sent in `configurable.prompt_overrides[name]`. */
export interface PromptOverride {
  name?: string;
  label?: string;
  version?: number;
}

/** A registered default prompt entry. */
export interface RegisteredPrompt {
  name: string;
  defaultContent: string;
}

// ---------------------------------------------------------------------------
// Prompt registry
// ---------------------------------------------------------------------------

const registeredPrompts: RegisteredPrompt[] = [];
const registeredNames: Set<string> = new Set();

/**
 * Register a prompt default for seeding in Langfuse at startup.
 *
 * Call at module level in each graph's prompts module. Only stores the
 * registration; no network calls are made. First registration wins.
 */
export function registerDefaultPrompt(name: string, defaultContent: string): void {
  if (registeredNames.has(name)) {
    return;
  }
  registeredNames.add(name);
  registeredPrompts.push({ name, defaultContent });
}

/** Snapshot of the registered defaults, in registration order. */
export function getRegisteredPrompts(): RegisteredPrompt[] {
  return registeredPrompts.map((entry) => ({ ...entry }));
}

// ---------------------------------------------------------------------------
// Langfuse client
// ---------------------------------------------------------------------------

let langfuseClient: LangfuseClient | null = null;

/** Lazily create the shared client; keys are read from `LANGFUSE_*`. */
function getLangfuseClient(): LangfuseClient {
  if (langfuseClient === null) {
    langfuseClient = new LangfuseClient();
  }
  return langfuseClient;
}

/**
 * Create any missing prompts in Langfuse from registered defaults.
 *
 * Call once at startup, after `initializeLangfuse()`. Idempotent:
 * prompts that already exist are left alone.
 *
 * @returns The number of prompts created (0 when Langfuse is disabled).
 */
export async function seedDefaultPrompts(): Promise<number> {
  if (!isLangfuseEnabled() || registeredPrompts.length === 0) {
    return 0;
  }

  const client = getLangfuseClient();
  let createdCount = 0;

  for (const entry of registeredPrompts) {
    try {
      const existing = await client.prompt.get(entry.name, {
        type: "text",
        fallback: entry.defaultContent,
        cacheTtlSeconds: 0,
      });

      if (existing.isFallback) {
        await client.prompt.create({
          name: entry.name,
          type: "text",
          prompt: entry.defaultContent,
          labels: ["production"],
        });
        createdCount += 1;
        console.info(`[prompts] Seeded Langfuse prompt: ${entry.name}`);
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[prompts] Failed to seed '${entry.name}': ${message}`);
    }
  }

  return createdCount;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const VARIABLE_PATTERN = /\{\{(\w+)\}\}/g;

const DEFAULT_CACHE_TTL_SECONDS = 300;

/** Read the global cache TTL from the environment, or use the default. */
export function getDefaultCacheTtl(): number {
  const raw = process.env.LANGFUSE_PROMPT_CACHE_TTL;
  if (raw !== undefined && raw !== "") {
    const parsed = parseInt(raw, 10);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
    console.warn(
      `[prompts] LANGFUSE_PROMPT_CACHE_TTL='${raw}' is not a valid integer, using default ${DEFAULT_CACHE_TTL_SECONDS}`,
    );
  }
  return DEFAULT_CACHE_TTL_SECONDS;
}

/**
 * Replace `{{key}}` placeholders in a template.
 *
 * Unknown placeholders are left untouched. Substituted values are not
 * scanned again, so a value containing `{{...}}` is inserted verbatim.
 */
export function substituteVariablesText(
  template: string,
  variables: Record<string, string>,
): string {
  return template.replace(VARIABLE_PATTERN, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match,
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract prompt overrides for a specific prompt name from config.
 *
 * Looks for `config.configurable.prompt_overrides[name]`. Entries of the
 * wrong type are ignored.
 */
export function extractOverrides(
  name: string,
  config: RunnableConfig | null | undefined,
): PromptOverride {
  const promptOverrides = config?.configurable?.prompt_overrides;
  if (!isRecord(promptOverrides)) {
    return {};
  }
  const entry = promptOverrides[name];
  if (!isRecord(entry)) {
    return {};
  }

  const override: PromptOverride = {};
  if (typeof entry.name === "string" && entry.name) {
    override.name = entry.name;
  }
  if (typeof entry.label === "string" && entry.label) {
    override.label = entry.label;
  }
  if (typeof entry.version === "number" && Number.isInteger(entry.version)) {
    override.version = entry.version;
  }
  return override;
}

function applyFallback(
  fallback: string,
  variables: Record<string, string> | null,
): string {
  return variables ? substituteVariablesText(fallback, variables) : fallback;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Fetch a prompt from Langfuse, falling back to a hardcoded default.
 *
 * 1. **Langfuse enabled and reachable** — returns the Langfuse prompt
 *    (possibly overridden by `configurable.prompt_overrides`).
 * 2. **Langfuse enabled but unreachable** — logs a warning and returns
 *    the fallback.
 * 3. **Langfuse disabled** — returns the fallback with no network calls.
 *
 * Variables are substituted in every case.
 */
export async function getPrompt(options: GetPromptOptions): Promise<string> {
  const {
    name,
    fallback,
    config = null,
    label = "production",
    cacheTtlSeconds = null,
    variables = null,
  } = options;

  if (!isLangfuseEnabled()) {
    return applyFallback(fallback, variables);
  }

  const overrides = extractOverrides(name, config);
  const effectiveName = overrides.name ?? name;

  try {
    // Langfuse treats version and label as mutually exclusive selectors.
    const selector =
      overrides.version !== undefined
        ? { version: overrides.version }
        : { label: overrides.label ?? label };

    const prompt = await getLangfuseClient().prompt.get(effectiveName, {
      type: "text",
      fallback,
      cacheTtlSeconds: cacheTtlSeconds ?? getDefaultCacheTtl(),
      ...selector,
    });

    if (prompt.isFallback) {
      console.info(
        `[prompts] Langfuse returned fallback for prompt '${effectiveName}' (prompt may not exist yet in Langfuse)`,
      );
    }

    return prompt.compile(variables ?? {});
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(
      `[prompts] Failed to fetch prompt '${effectiveName}' from Langfuse, using fallback: ${message}`,
    );
    return applyFallback(fallback, variables);
  }
}

// ---------------------------------------------------------------------------
// Reset (testing only)
// ---------------------------------------------------------------------------

/** Clear registered defaults and the cached client. For tests only. */
export function resetPromptRegistry(): void {
  registeredPrompts.length = 0;
  registeredNames.clear();
  langfuseClient = null;
}
