/**
 * Research scoping workflow.
 *
 * Decides whether the user's request needs clarification and, once it
 * does not, condenses the conversation into a research brief for the
 * downstream supervisor agent:
 *
 *     START
 *       → clarify_with_user     (LLM: ClarifyWithUser decision)
 *           ├─ need clarification → END  (question appended to messages)
 *           └─ clear enough → write_research_brief  (verification appended)
 *       → write_research_brief  (LLM: ResearchQuestion)
 *       → END                   (researchBrief + supervisorMessages set)
 *
 * Routing out of `clarify_with_user` is done with `Command`, so the node
 * declares its possible destinations through `ends`.
 *
 * Both nodes share one {@link ScopeModelClient}, built by the `graph()`
 * factory with its own rate limiter and passed in explicitly.
 */

import {
  AIMessage,
  HumanMessage,
  getBufferString,
  type BaseMessage,
} from "@langchain/core/messages";
import type { RunnableConfig } from "@langchain/core/runnables";
import {
  Command,
  END,
  START,
  StateGraph,
  type LangGraphRunnableConfig,
} from "@langchain/langgraph";

import type { GraphFactory, GraphFactoryOptions } from "../types";
import { createChatModel } from "../providers";
import { ScopeModelClient, chatModelProvider } from "../structured-model";
import { InMemoryRateLimiter } from "../../infra/rate-limiter";
import { getPrompt } from "../../infra/prompts";
import { InvalidInputError } from "../../models/errors";
import { getTodayStr } from "../../utils/dates";
import { parseScopeConfig } from "./configuration";
import { interpretScopeState, toClarificationOutcome, type ScopeResult } from "./outcome";
import {
  CLARIFY_WITH_USER_PROMPT,
  CLARIFY_WITH_USER_PROMPT_NAME,
  WRITE_RESEARCH_BRIEF_PROMPT,
  WRITE_RESEARCH_BRIEF_PROMPT_NAME,
} from "./prompts";
import { CLARIFY_WITH_USER, RESEARCH_QUESTION } from "./schemas";
import {
  ScopeInputAnnotation,
  ScopeStateAnnotation,
  type ScopeState,
  type ScopeUpdate,
} from "./state";

export const CLARIFY_WITH_USER_NODE = "clarify_with_user";
export const WRITE_RESEARCH_BRIEF_NODE = "write_research_brief";

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Collaborators the nodes need; constructed once per graph. */
export interface ScopeGraphDependencies {
  model: ScopeModelClient;
  /** Clock used for the date in the prompts. Defaults to the system clock. */
  now?: () => Date;
}

/**
 * Resolve a scoping prompt and fill in the transcript and today's date.
 *
 * `config` carries any `prompt_overrides` the caller sent.
 */
async function renderScopePrompt(
  name: string,
  fallback: string,
  messages: BaseMessage[],
  deps: ScopeGraphDependencies,
  config: RunnableConfig | undefined,
): Promise<string> {
  const now = deps.now ?? (() => new Date());
  return getPrompt({
    name,
    fallback,
    config,
    variables: {
      messages: getBufferString(messages),
      date: getTodayStr(now()),
    },
  });
}

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

/**
 * Build the clarification decision node.
 *
 * Asks the model whether the conversation is specific enough to research.
 * Ends the run with the model's question (clearing any brief from an
 * earlier turn), or hands over to `write_research_brief` after appending
 * its verification message.
 */
export function createClarifyWithUserNode(deps: ScopeGraphDependencies) {
  return async function clarifyWithUser(
    state: ScopeState,
    config?: LangGraphRunnableConfig,
  ): Promise<Command> {
    const prompt = await renderScopePrompt(
      CLARIFY_WITH_USER_PROMPT_NAME,
      CLARIFY_WITH_USER_PROMPT,
      state.messages,
      deps,
      config,
    );

    const decision = await deps.model.invokeStructured(
      CLARIFY_WITH_USER,
      [new HumanMessage(prompt)],
      config,
    );
    const outcome = toClarificationOutcome(decision);

    if (outcome.kind === "clarification_needed") {
      console.info(
        `[scope-research] clarify_with_user: clarification needed after ${state.messages.length} messages`,
      );
      // A brief left on the thread by an earlier turn no longer applies.
      return new Command({
        goto: END,
        update: { messages: [new AIMessage(outcome.question)], researchBrief: null },
      });
    }

    console.info("[scope-research] clarify_with_user: request is clear, writing research brief");
    return new Command({
      goto: WRITE_RESEARCH_BRIEF_NODE,
      update: { messages: [new AIMessage(outcome.verification)] },
    });
  };
}

/**
 * Build the research brief node.
 *
 * Turns the conversation into a single research question, stores it as
 * `researchBrief` and seeds the supervisor conversation with it.
 */
export function createWriteResearchBriefNode(deps: ScopeGraphDependencies) {
  return async function writeResearchBrief(
    state: ScopeState,
    config?: LangGraphRunnableConfig,
  ): Promise<ScopeUpdate> {
    const prompt = await renderScopePrompt(
      WRITE_RESEARCH_BRIEF_PROMPT_NAME,
      WRITE_RESEARCH_BRIEF_PROMPT,
      state.messages,
      deps,
      config,
    );

    const { researchBrief } = await deps.model.invokeStructured(
      RESEARCH_QUESTION,
      [new HumanMessage(prompt)],
      config,
    );

    console.info(
      `[scope-research] write_research_brief: brief written (${researchBrief.length} chars)`,
    );

    return {
      researchBrief,
      supervisorMessages: [new HumanMessage(`${researchBrief}.`)],
    };
  };
}

// ---------------------------------------------------------------------------
// Graph builder
// ---------------------------------------------------------------------------

/**
 * Construct and compile the scoping StateGraph.
 *
 * Callers may only supply `messages`; the other channels are written by
 * the nodes. The return type is left inferred so the concrete compiled graph type
 * (and its state type) reaches callers.
 *
 * @param deps - Model client and clock shared by both nodes.
 * @param options - Optional checkpointer and store.
 */
export function buildScopeGraph(
  deps: ScopeGraphDependencies,
  options: GraphFactoryOptions = {},
) {
  const compiled = new StateGraph({
    stateSchema: ScopeStateAnnotation,
    input: ScopeInputAnnotation,
  })
    .addNode(CLARIFY_WITH_USER_NODE, createClarifyWithUserNode(deps), {
      ends: [WRITE_RESEARCH_BRIEF_NODE, END],
    })
    .addNode(WRITE_RESEARCH_BRIEF_NODE, createWriteResearchBriefNode(deps))
    .addEdge(START, CLARIFY_WITH_USER_NODE)
    .addEdge(WRITE_RESEARCH_BRIEF_NODE, END)
    .compile({
      checkpointer: options.checkpointer,
      store: options.store,
    });
  compiled.name = "scope_research";

  console.info(
    `[scope-research] graph compiled: checkpointer=${options.checkpointer ? "yes" : "none"}, store=${options.store ? "yes" : "none"}`,
  );

  return compiled;
}

export type ScopeGraph = ReturnType<typeof buildScopeGraph>;

// ---------------------------------------------------------------------------
// Public graph factory
// ---------------------------------------------------------------------------

/**
 * Build a compiled scoping graph from configuration.
 *
 * 1. Parses the configurable dict into a typed `ScopeResearchConfig`.
 * 2. Creates a chat model via the multi-provider factory.
 * 3. Creates the request rate limiter and the model client around them.
 * 4. Compiles the graph with the given checkpointer/store.
 *
 * @example
 *   const scopeGraph = await graph({ model_name: "openai:gpt-4.1" });
 *   const state = await scopeGraph.invoke({
 *     messages: [new HumanMessage("Compare the last three EU AI Act drafts")],
 *   });
 */
export const graph: GraphFactory<ScopeGraph> = async function graph(
  config: Record<string, unknown>,
  options?: GraphFactoryOptions,
): Promise<ScopeGraph> {
  const parsedConfig = parseScopeConfig(config);

  console.info(
    `[scope-research] graph() invoked; model_name=${parsedConfig.modelName}, ` +
      `base_url_present=${Boolean(parsedConfig.baseUrl)}, ` +
      `requests_per_second=${parsedConfig.requestsPerSecond}`,
  );

  const chatModel = await createChatModel(parsedConfig, config);
  const rateLimiter = new InMemoryRateLimiter({
    requestsPerSecond: parsedConfig.requestsPerSecond,
    checkEveryNSeconds: parsedConfig.checkEveryNSeconds,
    maxBucketSize: parsedConfig.maxBucketSize,
  });
  const model = new ScopeModelClient(chatModelProvider(chatModel), rateLimiter);

  return buildScopeGraph({ model }, options);
};

// ---------------------------------------------------------------------------
// Invocation helper
// ---------------------------------------------------------------------------

/**
 * Run one scoping invocation and interpret its terminal state.
 *
 * @throws InvalidInputError when `messages` is empty; no model call is made.
 */
export async function runScope(
  scopeGraph: ScopeGraph,
  messages: BaseMessage[],
  config?: RunnableConfig,
): Promise<ScopeResult> {
  if (messages.length === 0) {
    throw new InvalidInputError("messages must contain at least one message");
  }
  const state = await scopeGraph.invoke({ messages }, config);
  return interpretScopeState(state);
}
