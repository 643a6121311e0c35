/**
 * Unit tests for the Langfuse prompt module.
 *
 * Covers:
 *   - Text variable substitution (substituteVariablesText)
 *   - Config override extraction (extractOverrides)
 *   - Prompt registration and deduplication (registerDefaultPrompt)
 *   - Prompt retrieval with and without Langfuse (getPrompt)
 *   - Seeding missing prompts (seedDefaultPrompts)
 *   - Cache TTL resolution from environment
 *
 * The Langfuse client is replaced with an in-process fake.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const langfuse = vi.hoisted(() => ({
  get: vi.fn(),
  create: vi.fn(),
}));

vi.mock("@langfuse/client", () => ({
  LangfuseClient: class {
    prompt = { get: langfuse.get, create: langfuse.create };
  },
}));

import {
  extractOverrides,
  getDefaultCacheTtl,
  getPrompt,
  getRegisteredPrompts,
  registerDefaultPrompt,
  resetPromptRegistry,
  seedDefaultPrompts,
  substituteVariablesText,
} from "../src/infra/prompts";
import { _resetTracingState } from "../src/infra/tracing";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Save and restore environment variables around each test. */
function saveEnv(...keys: string[]): Record<string, string | undefined> {
  const saved: Record<string, string | undefined> = {};
  for (const key of keys) {
    saved[key] = process.env[key];
  }
  return saved;
}

function restoreEnv(saved: Record<string, string | undefined>): void {
  for (const [key, value] of Object.entries(saved)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

/** What the Langfuse SDK hands back for a text prompt. */
function langfusePrompt(template: string, isFallback = false) {
  return {
    isFallback,
    compile: (variables: Record<string, string>) => substituteVariablesText(template, variables),
  };
}

let savedEnv: Record<string, string | undefined>;

beforeEach(() => {
  savedEnv = saveEnv("LANGFUSE_PROMPT_CACHE_TTL");
  delete process.env.LANGFUSE_PROMPT_CACHE_TTL;
  resetPromptRegistry();
  _resetTracingState();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  restoreEnv(savedEnv);
  resetPromptRegistry();
  _resetTracingState();
  langfuse.get.mockReset();
  langfuse.create.mockReset();
});

// ===========================================================================
// substituteVariablesText
// ===========================================================================

describe("substituteVariablesText", () => {
  it("replaces known variables in template", () => {
    expect(
      substituteVariablesText("Messages:\n{{messages}}\nDate: {{date}}", {
        messages: "Human: hi",
        date: "Sun Oct 18, 2026",
      }),
    ).toBe("Messages:\nHuman: hi\nDate: Sun Oct 18, 2026");
  });

  it("leaves unknown variables untouched", () => {
    expect(substituteVariablesText("{{messages}} on {{date}}", { messages: "x" })).toBe(
      "x on {{date}}",
    );
  });

  it("replaces repeated occurrences of the same variable", () => {
    expect(substituteVariablesText("{{x}} and {{x}} again.", { x: "yes" })).toBe(
      "yes and yes again.",
    );
  });

  it("does not expand placeholders inside substituted values", () => {
    expect(
      substituteVariablesText("{{messages}} / {{date}}", {
        messages: "Human: what is {{date}}?",
        date: "today",
      }),
    ).toBe("Human: what is {{date}}? / today");
  });

  it("ignores keys inherited from Object.prototype", () => {
    expect(substituteVariablesText("{{toString}}", {})).toBe("{{toString}}");
  });
});

// ===========================================================================
// extractOverrides
// ===========================================================================

describe("extractOverrides", () => {
  it("returns empty object without config", () => {
    expect(extractOverrides("p", undefined)).toEqual({});
    expect(extractOverrides("p", null)).toEqual({});
  });

  it("returns empty object when prompt_overrides is missing or not an object", () => {
    expect(extractOverrides("p", { configurable: {} })).toEqual({});
    expect(extractOverrides("p", { configurable: { prompt_overrides: "nope" } })).toEqual({});
  });

  it("returns the entry for the requested name only", () => {
    const config = {
      configurable: {
        prompt_overrides: {
          p: { label: "experiment-a" },
          other: { version: 2 },
        },
      },
    };
    expect(extractOverrides("p", config)).toEqual({ label: "experiment-a" });
  });

  it("keeps name, label and integer version, dropping wrong types", () => {
    const config = {
      configurable: {
        prompt_overrides: {
          p: { name: "p-v2", label: 7, version: 1.5, extra: true },
        },
      },
    };
    expect(extractOverrides("p", config)).toEqual({ name: "p-v2" });
  });
});

// ===========================================================================
// Registry
// ===========================================================================

describe("registerDefaultPrompt", () => {
  it("records registrations in order", () => {
    registerDefaultPrompt("a", "A");
    registerDefaultPrompt("b", "B");
    expect(getRegisteredPrompts()).toEqual([
      { name: "a", defaultContent: "A" },
      { name: "b", defaultContent: "B" },
    ]);
  });

  it("keeps the first registration of a name", () => {
    registerDefaultPrompt("a", "first");
    registerDefaultPrompt("a", "second");
    expect(getRegisteredPrompts()).toEqual([{ name: "a", defaultContent: "first" }]);
  });

  it("resetPromptRegistry clears everything", () => {
    registerDefaultPrompt("a", "A");
    resetPromptRegistry();
    expect(getRegisteredPrompts()).toEqual([]);
  });
});

// ===========================================================================
// Cache TTL
// ===========================================================================

describe("getDefaultCacheTtl", () => {
  it("defaults to 300 seconds", () => {
    expect(getDefaultCacheTtl()).toBe(300);
  });

  it("reads LANGFUSE_PROMPT_CACHE_TTL", () => {
    process.env.LANGFUSE_PROMPT_CACHE_TTL = "0";
    expect(getDefaultCacheTtl()).toBe(0);
  });

  it("warns and falls back on a non-integer value", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    process.env.LANGFUSE_PROMPT_CACHE_TTL = "soon";
    expect(getDefaultCacheTtl()).toBe(300);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

// ===========================================================================
// getPrompt
// ===========================================================================

describe("getPrompt — Langfuse disabled", () => {
  it("returns the fallback with variables substituted", async () => {
    const text = await getPrompt({
      name: "p",
      fallback: "Today's date is {{date}}.",
      variables: { date: "Sun Oct 18, 2026" },
    });
    expect(text).toBe("Today's date is Sun Oct 18, 2026.");
    expect(langfuse.get).not.toHaveBeenCalled();
  });

  it("ignores overrides", async () => {
    const text = await getPrompt({
      name: "p",
      fallback: "fallback",
      config: { configurable: { prompt_overrides: { p: { name: "other" } } } },
    });
    expect(text).toBe("fallback");
    expect(langfuse.get).not.toHaveBeenCalled();
  });
});

describe("getPrompt — Langfuse enabled", () => {
  beforeEach(() => {
    _resetTracingState(true);
  });

  it("fetches the production label and compiles variables", async () => {
    langfuse.get.mockResolvedValue(langfusePrompt("Managed: {{date}}"));

    const text = await getPrompt({
      name: "p",
      fallback: "fallback {{date}}",
      variables: { date: "Sun Oct 18, 2026" },
    });

    expect(text).toBe("Managed: Sun Oct 18, 2026");
    expect(langfuse.get).toHaveBeenCalledWith("p", {
      type: "text",
      fallback: "fallback {{date}}",
      cacheTtlSeconds: 300,
      label: "production",
    });
  });

  it("pins a version instead of a label when overridden", async () => {
    langfuse.get.mockResolvedValue(langfusePrompt("v5"));

    await getPrompt({
      name: "p",
      fallback: "fallback",
      cacheTtlSeconds: 0,
      config: { configurable: { prompt_overrides: { p: { version: 5, label: "ignored" } } } },
    });

    expect(langfuse.get).toHaveBeenCalledWith("p", {
      type: "text",
      fallback: "fallback",
      cacheTtlSeconds: 0,
      version: 5,
    });
  });

  it("swaps the prompt name and label when overridden", async () => {
    langfuse.get.mockResolvedValue(langfusePrompt("other"));

    await getPrompt({
      name: "p",
      fallback: "fallback",
      config: {
        configurable: { prompt_overrides: { p: { name: "p-experiment", label: "experiment-a" } } },
      },
    });

    expect(langfuse.get).toHaveBeenCalledWith("p-experiment", {
      type: "text",
      fallback: "fallback",
      cacheTtlSeconds: 300,
      label: "experiment-a",
    });
  });

  it("falls back with a warning when Langfuse fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    langfuse.get.mockRejectedValue(new Error("fetch failed"));

    const text = await getPrompt({
      name: "p",
      fallback: "fallback {{date}}",
      variables: { date: "today" },
    });

    expect(text).toBe("fallback today");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

// ===========================================================================
// seedDefaultPrompts
// ===========================================================================

describe("seedDefaultPrompts", () => {
  it("does nothing when Langfuse is disabled", async () => {
    registerDefaultPrompt("a", "A");
    expect(await seedDefaultPrompts()).toBe(0);
    expect(langfuse.get).not.toHaveBeenCalled();
  });

  it("creates only the prompts Langfuse does not have yet", async () => {
    _resetTracingState(true);
    registerDefaultPrompt("existing", "E");
    registerDefaultPrompt("missing", "M");
    langfuse.get.mockImplementation(async (name: string) =>
      langfusePrompt(name, name === "missing"),
    );
    langfuse.create.mockResolvedValue({});

    expect(await seedDefaultPrompts()).toBe(1);
    expect(langfuse.create).toHaveBeenCalledTimes(1);
    expect(langfuse.create).toHaveBeenCalledWith({
      name: "missing",
      type: "text",
      prompt: "M",
      labels: ["production"],
    });
  });

  it("keeps going when one prompt fails to seed", async () => {
    _resetTracingState(true);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    registerDefaultPrompt("broken", "B");
    registerDefaultPrompt("missing", "M");
    langfuse.get.mockImplementation(async (name: string) => {
      if (name === "broken") throw new Error("500");
      return langfusePrompt(name, true);
    });
    langfuse.create.mockResolvedValue({});

    expect(await seedDefaultPrompts()).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
