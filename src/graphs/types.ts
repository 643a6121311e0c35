/**
 * Shared graph types.
 *
 * A graph factory takes the caller's `configurable` dict and optional
 * persistence, and returns a compiled graph. The factory signature is the
 * one LangGraph-compatible servers use, so the scoping graph can be served
 * next to other agents without an adapter.
 */

import type { BaseCheckpointSaver, BaseStore } from "@langchain/langgraph";

/**
 * Options passed to a graph factory alongside the config.
 *
 * Both fields are optional. When omitted, the graph runs without
 * persistence, which is all a single scoping invocation needs.
 */
export interface GraphFactoryOptions {
  /** Checkpointer for thread state persistence (e.g. `MemorySaver`). */
  checkpointer?: BaseCheckpointSaver;

  /** Cross-thread memory store. */
  store?: BaseStore;
}

/**
 * Async function that builds a compiled graph from configuration.
 *
 * @param config - The assistant's configurable dictionary.
 * @param options - Optional checkpointer and store.
 * @returns A compiled graph ready for `.invoke()` / `.stream()`.
 */
export type GraphFactory<TGraph> = (
  config: Record<string, unknown>,
  options?: GraphFactoryOptions,
) => Promise<TGraph>;
