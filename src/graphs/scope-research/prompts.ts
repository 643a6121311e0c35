/**
 * Default prompts for the research scoping graph.
 *
 * Both are text prompts with two placeholders:
 *
 * - `{{messages}}` — the conversation, rendered as a `Human:` / `AI:` transcript
 * - `{{date}}` — today's date, e.g. `Sun Oct 18, 2026`
 *
 * They are registered with the prompt registry on import so that
 * `seedDefaultPrompts()` can create them in Langfuse, where they can then
 * be edited without a deploy.
 */

import { registerDefaultPrompt } from "../../infra/prompts";

export const CLARIFY_WITH_USER_PROMPT_NAME = "scope-research-clarify-with-user";
export const WRITE_RESEARCH_BRIEF_PROMPT_NAME = "scope-research-write-research-brief";

export const PROMPT_NAMES = [
  CLARIFY_WITH_USER_PROMPT_NAME,
  WRITE_RESEARCH_BRIEF_PROMPT_NAME,
] as const;

export const CLARIFY_WITH_USER_PROMPT = `These are the messages exchanged so far with the user who asked for a research report:
<Messages>
{{messages}}
</Messages>

Today's date is {{date}}.

Decide whether you need to ask the user one clarifying question before starting the research, or whether the request is already clear enough to begin.
If an earlier AI message in this conversation already asked a clarifying question, do not ask another one unless it is strictly necessary.

Ask for clarification when the request contains:
- acronyms, abbreviations or terms you do not recognise
- a referent you cannot resolve ("it", "that project", "the thing we discussed")
- a scope so broad that the report could go in several unrelated directions

When you ask:
- keep the question short and collect everything you are missing in one go
- use bullet points or a numbered list when you need several details, formatted as markdown
- do not ask for information the user has already given

Respond in valid JSON with exactly these keys:
"need_clarification": boolean,
"question": "<question to ask the user to clarify the report scope>",
"verification": "<message confirming that research will start>"

If you need to ask a clarifying question, return:
"need_clarification": true,
"question": "<your clarifying question>",
"verification": ""

If you do not need to ask a clarifying question, return:
"need_clarification": false,
"question": "",
"verification": "<acknowledgement that you will now start the research>"

The acknowledgement should:
- confirm that you have enough information to proceed
- restate in one or two sentences what you understood the request to be
- say that you are starting the research now
- stay brief and professional`;

export const WRITE_RESEARCH_BRIEF_PROMPT = `You will be given the messages exchanged so far between yourself and the user.
Turn them into one detailed, self-contained research question that will guide the research.

<Messages>
{{messages}}
</Messages>

Today's date is {{date}}.

Return a single research question.

Guidelines:
1. Be as specific and detailed as the conversation allows.
   - Carry over every preference, constraint and detail the user gave.
   - State explicitly which aspects or dimensions the research must cover.
2. Mark unstated dimensions as open.
   - When a dimension matters for a good answer but the user did not specify it, say that it is open rather than picking a value.
3. Do not invent requirements.
   - Never add preferences, constraints or assumptions the user did not state.
4. Write in the first person, from the user's point of view.
5. Ground time-sensitive requests in today's date.
6. Sources:
   - If the user named particular sources, prioritise them.
   - For products and services, prefer official sites and primary documentation over aggregators.
   - For academic questions, prefer original papers and official publications over summaries.
   - For people, prefer their own profiles and pages.
   - If the request is in a language other than English, prefer sources in that language.`;

registerDefaultPrompt(CLARIFY_WITH_USER_PROMPT_NAME, CLARIFY_WITH_USER_PROMPT);
registerDefaultPrompt(WRITE_RESEARCH_BRIEF_PROMPT_NAME, WRITE_RESEARCH_BRIEF_PROMPT);
