/**
 * State annotations for the research scoping graph.
 *
 * `ScopeStateAnnotation` is the full state shared with the downstream
 * research pipeline; the scoping graph itself writes only `messages`,
 * `researchBrief` and `supervisorMessages`. The remaining fields are
 * declared here so a parent graph can embed this one without remapping.
 */

import type { BaseMessage } from "@langchain/core/messages";
import { Annotation, MessagesAnnotation, messagesStateReducer } from "@langchain/langgraph";

// ---------------------------------------------------------------------------
// Reducers
// ---------------------------------------------------------------------------

/** Append-only list reducer: concatenates the update onto the current value. */
export function appendReducer<T>(current: T[], update: T[]): T[] {
  return [...current, ...update];
}

// ---------------------------------------------------------------------------
// Input state
// ---------------------------------------------------------------------------

/** What callers pass in: just the conversation so far. */
export const ScopeInputAnnotation = MessagesAnnotation;

export type ScopeInput = typeof ScopeInputAnnotation.State;

// ---------------------------------------------------------------------------
// Full state
// ---------------------------------------------------------------------------

export const ScopeStateAnnotation = Annotation.Root({
  // User-visible conversation, add_messages semantics.
  ...MessagesAnnotation.spec,

  /** Research brief derived from the conversation; `null` until written. */
  researchBrief: Annotation<string | null>({
    reducer: (_previous, next) => next,
    default: () => null,
  }),

  /** Messages for the downstream supervisor agent. */
  supervisorMessages: Annotation<BaseMessage[]>({
    reducer: messagesStateReducer,
    default: () => [],
  }),

  /** Raw research notes collected downstream. */
  rawNotes: Annotation<string[]>({
    reducer: appendReducer,
    default: () => [],
  }),

  /** Processed notes ready for report generation. */
  notes: Annotation<string[]>({
    reducer: appendReducer,
    default: () => [],
  }),

  /** Final formatted report, written downstream. */
  finalReport: Annotation<string>({
    reducer: (_previous, next) => next,
    default: () => "",
  }),
});

export type ScopeState = typeof ScopeStateAnnotation.State;
export type ScopeUpdate = typeof ScopeStateAnnotation.Update;
