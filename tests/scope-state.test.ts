/**
 * Tests for scoping state, outcomes and default prompt registration.
 */

import { describe, test, expect } from "vitest";
import { AIMessage, HumanMessage } from "@langchain/core/messages";

import { interpretScopeState, toClarificationOutcome } from "../src/graphs/scope-research/outcome";
import {
  CLARIFY_WITH_USER_PROMPT,
  PROMPT_NAMES,
  WRITE_RESEARCH_BRIEF_PROMPT,
} from "../src/graphs/scope-research/prompts";
import { appendReducer } from "../src/graphs/scope-research/state";
import { getRegisteredPrompts } from "../src/infra/prompts";

describe("appendReducer", () => {
  test("concatenates updates onto the current list", () => {
    expect(appendReducer(["a"], ["b", "c"])).toEqual(["a", "b", "c"]);
  });

  test("does not mutate its inputs", () => {
    const current = ["a"];
    appendReducer(current, ["b"]);
    expect(current).toEqual(["a"]);
  });
});

describe("toClarificationOutcome", () => {
  test("keeps only the question when clarification is needed", () => {
    expect(
      toClarificationOutcome({ needClarification: true, question: "Which region?", verification: "ok" }),
    ).toEqual({ kind: "clarification_needed", question: "Which region?" });
  });

  test("keeps only the verification otherwise", () => {
    expect(
      toClarificationOutcome({ needClarification: false, question: "ignored", verification: "Starting." }),
    ).toEqual({ kind: "ready_for_brief", verification: "Starting." });
  });
});

describe("interpretScopeState", () => {
  const human = new HumanMessage("Compare heat pumps");

  test("a set brief means the brief is ready", () => {
    const seed = new HumanMessage("I want to compare heat pumps.");
    const result = interpretScopeState({
      messages: [human, new AIMessage("Starting the research now.")],
      researchBrief: "I want to compare heat pumps",
      supervisorMessages: [seed],
    });
    expect(result).toEqual({
      status: "brief_ready",
      researchBrief: "I want to compare heat pumps",
      verification: "Starting the research now.",
      messages: [human, new AIMessage("Starting the research now.")],
      supervisorMessages: [seed],
    });
  });

  test("an unset brief means the run asked the user", () => {
    const result = interpretScopeState({
      messages: [human, new AIMessage("Which climate zone?")],
      researchBrief: null,
      supervisorMessages: [],
    });
    expect(result.status).toBe("needs_clarification");
    expect(result.status === "needs_clarification" && result.question).toBe("Which climate zone?");
  });

  test("an empty transcript yields an empty question", () => {
    const result = interpretScopeState({ messages: [], researchBrief: null, supervisorMessages: [] });
    expect(result).toEqual({ status: "needs_clarification", question: "", messages: [] });
  });
});

describe("default prompts", () => {
  test("both prompts are registered on import", () => {
    const registered = getRegisteredPrompts();
    expect(registered.map((entry) => entry.name)).toEqual([...PROMPT_NAMES]);
    expect(registered[0].defaultContent).toBe(CLARIFY_WITH_USER_PROMPT);
    expect(registered[1].defaultContent).toBe(WRITE_RESEARCH_BRIEF_PROMPT);
  });

  test("both prompts carry the messages and date placeholders", () => {
    for (const template of [CLARIFY_WITH_USER_PROMPT, WRITE_RESEARCH_BRIEF_PROMPT]) {
      expect(template).toContain("{{messages}}");
      expect(template).toContain("{{date}}");
    }
  });
});
