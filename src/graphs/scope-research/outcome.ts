/**
 * Tagged results for the scoping workflow.
 *
 * `ClarificationOutcome` is what the first node decides; `ScopeResult` is
 * what a finished invocation amounts to. Exactly one variant of each
 * applies, so callers can `switch` on the tag instead of inspecting
 * nullable state fields.
 */

import type { BaseMessage } from "@langchain/core/messages";

import type { ClarificationDecision } from "./schemas";
import type { ScopeState } from "./state";

// ---------------------------------------------------------------------------
// Decision outcome
// ---------------------------------------------------------------------------

export type ClarificationOutcome =
  | { kind: "clarification_needed"; question: string }
  | { kind: "ready_for_brief"; verification: string };

/** Collapse a decision to the one string that matters for its branch. */
export function toClarificationOutcome(decision: ClarificationDecision): ClarificationOutcome {
  if (decision.needClarification) {
    return { kind: "clarification_needed", question: decision.question };
  }
  return { kind: "ready_for_brief", verification: decision.verification };
}

// ---------------------------------------------------------------------------
// Invocation result
// ---------------------------------------------------------------------------

export interface ClarificationRequestedResult {
  status: "needs_clarification";
  /** The clarifying question appended to `messages`. */
  question: string;
  messages: BaseMessage[];
}

export interface BriefReadyResult {
  status: "brief_ready";
  researchBrief: string;
  /** The acknowledgement appended to `messages`. */
  verification: string;
  messages: BaseMessage[];
  /** Seed messages for the downstream supervisor agent. */
  supervisorMessages: BaseMessage[];
}

export type ScopeResult = ClarificationRequestedResult | BriefReadyResult;

function lastMessageText(messages: BaseMessage[]): string {
  const last = messages.at(-1);
  return last ? last.text : "";
}

/**
 * Read the terminal state of a scoping run.
 *
 * A set `researchBrief` means the brief branch ran; otherwise the run
 * stopped to ask the user. Either way the last message is the assistant
 * reply the run appended.
 */
export function interpretScopeState(
  state: Pick<ScopeState, "messages" | "researchBrief" | "supervisorMessages">,
): ScopeResult {
  if (state.researchBrief !== null) {
    return {
      status: "brief_ready",
      researchBrief: state.researchBrief,
      verification: lastMessageText(state.messages),
      messages: state.messages,
      supervisorMessages: state.supervisorMessages,
    };
  }
  return {
    status: "needs_clarification",
    question: lastMessageText(state.messages),
    messages: state.messages,
  };
}
