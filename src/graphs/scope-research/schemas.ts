/**
 * Structured output contracts for the two scoping model calls.
 *
 * The zod schemas describe the JSON the model is asked to produce (field
 * names and descriptions are what the model sees). Each contract maps the
 * validated payload onto the camelCase record the graph works with.
 */

import { z } from "zod";

import type { StructuredOutputSpec } from "../structured-model";

// ---------------------------------------------------------------------------
// Clarification decision
// ---------------------------------------------------------------------------

export const ClarifyWithUserSchema = z.object({
  need_clarification: z
    .boolean()
    .describe("Whether the user needs to be asked a clarifying question."),
  question: z
    .string()
    .describe("A question to ask the user to clarify the report scope."),
  verification: z
    .string()
    .describe(
      "Verify message that we will start research after the user has provided the necessary information.",
    ),
});

/** Whether the model wants to ask the user something before researching. */
export interface ClarificationDecision {
  needClarification: boolean;
  /** Used only when `needClarification` is true. */
  question: string;
  /** Used only when `needClarification` is false. */
  verification: string;
}

export const CLARIFY_WITH_USER: StructuredOutputSpec<
  z.infer<typeof ClarifyWithUserSchema>,
  ClarificationDecision
> = {
  name: "ClarifyWithUser",
  schema: ClarifyWithUserSchema,
  transform: (payload) => ({
    needClarification: payload.need_clarification,
    question: payload.question,
    verification: payload.verification,
  }),
};

// ---------------------------------------------------------------------------
// Research brief
// ---------------------------------------------------------------------------

export const ResearchQuestionSchema = z.object({
  research_brief: z
    .string()
    .describe("A research question that will be used to guide the research.")
    .refine((value) => value.trim().length > 0, "research_brief must not be empty"),
});

export interface ResearchBrief {
  researchBrief: string;
}

export const RESEARCH_QUESTION: StructuredOutputSpec<
  z.infer<typeof ResearchQuestionSchema>,
  ResearchBrief
> = {
  name: "ResearchQuestion",
  schema: ResearchQuestionSchema,
  transform: (payload) => ({ researchBrief: payload.research_brief }),
};
