#!/usr/bin/env -S npx tsx
/**
 * Run the scoping graph once from the command line.
 *
 * Usage:
 *   npm run scope -- "Compare heat pump efficiency in cold climates"
 *   npm run scope -- -m openai:gpt-4.1-mini "Tell me about it"
 *   npm run scope -- --json --session demo "Summarize recent news on fusion startups"
 *
 * Environment is read from `.env` (see `.env.example`).
 */

import "dotenv/config";

import { parseArgs } from "node:util";
import { HumanMessage } from "@langchain/core/messages";

import { loadConfig, isLlmConfigured, isTracingConfigured, SERVICE_NAME, VERSION } from "../src/config";
import { graph, runScope } from "../src/graphs/scope-research";
import { seedDefaultPrompts } from "../src/infra/prompts";
import { initializeLangfuse, injectTracing, shutdownLangfuse } from "../src/infra/tracing";
import { toErrorResponse } from "../src/models/errors";

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  allowPositionals: true,
  options: {
    model: { type: "string", short: "m" },
    session: { type: "string", short: "s" },
    json: { type: "boolean", default: false },
  },
});

async function main(): Promise<number> {
  const request = positionals.join(" ").trim();
  if (!request) {
    console.error('Usage: npm run scope -- [-m provider:model] [--json] "<research request>"');
    return 2;
  }

  const appConfig = loadConfig();
  if (!isLlmConfigured(appConfig)) {
    console.warn("[run-scope] no model provider key found in the environment");
  }
  if (isTracingConfigured(appConfig) && initializeLangfuse()) {
    await seedDefaultPrompts();
  }

  const scopeGraph = await graph({ model_name: values.model ?? appConfig.modelName });
  const runConfig = injectTracing(
    {},
    {
      sessionId: values.session,
      traceName: "scope-research",
      tags: [SERVICE_NAME, VERSION],
    },
  );

  const result = await runScope(scopeGraph, [new HumanMessage(request)], runConfig);

  if (values.json) {
    const summary =
      result.status === "brief_ready"
        ? { status: result.status, verification: result.verification, researchBrief: result.researchBrief }
        : { status: result.status, question: result.question };
    console.log(JSON.stringify(summary, null, 2));
  } else if (result.status === "needs_clarification") {
    console.log(`Clarification needed:\n\n${result.question}`);
  } else {
    console.log(`${result.verification}\n\nResearch brief:\n\n${result.researchBrief}`);
  }
  return 0;
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(JSON.stringify(toErrorResponse(error)));
    process.exitCode = 1;
  })
  .finally(() => shutdownLangfuse());
