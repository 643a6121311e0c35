/**
 * Research scoping graph — clarification decision and research brief.
 *
 * Usage:
 *
 *   import { graph, runScope } from "../graphs/scope-research";
 *
 *   const scopeGraph = await graph(configurable, { checkpointer });
 *   const result = await runScope(scopeGraph, messages);
 *   if (result.status === "brief_ready") handOff(result.supervisorMessages);
 */

export {
  graph,
  buildScopeGraph,
  runScope,
  createClarifyWithUserNode,
  createWriteResearchBriefNode,
  CLARIFY_WITH_USER_NODE,
  WRITE_RESEARCH_BRIEF_NODE,
  type ScopeGraph,
  type ScopeGraphDependencies,
} from "./agent";
export {
  parseScopeConfig,
  DEFAULT_MODEL_NAME,
  DEFAULT_TEMPERATURE,
  DEFAULT_REQUESTS_PER_SECOND,
  DEFAULT_CHECK_EVERY_N_SECONDS,
  DEFAULT_MAX_BUCKET_SIZE,
  type ScopeResearchConfig,
} from "./configuration";
export {
  interpretScopeState,
  toClarificationOutcome,
  type ClarificationOutcome,
  type ScopeResult,
  type BriefReadyResult,
  type ClarificationRequestedResult,
} from "./outcome";
export { PROMPT_NAMES } from "./prompts";
export {
  CLARIFY_WITH_USER,
  RESEARCH_QUESTION,
  type ClarificationDecision,
  type ResearchBrief,
} from "./schemas";
export {
  ScopeStateAnnotation,
  ScopeInputAnnotation,
  appendReducer,
  type ScopeState,
  type ScopeUpdate,
  type ScopeInput,
} from "./state";
