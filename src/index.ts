#!/usr/bin/env node
/**
 * index.ts — File assistant entry point
 *
 * Validates config, builds the provider, tools and agent, then runs the
 * terminal chat loop until the user leaves. Handles SIGINT / SIGTERM.
 */

import { resolve } from "path";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { createProvider, providerLabel } from "./providers/registry.js";
import { buildFileTools } from "./tools/files.js";
import { createToolRegistry } from "./tools/index.js";
import { createLlmSummarizer } from "./summarizer.js";
import { createAgent, loadSystemPrompt } from "./agent.js";
import { runChat } from "./chat.js";

async function main() {
    const provider = createProvider(config);
    const root = resolve(config.FILE_ROOT);

    logger.info("🚀 File assistant starting up…", {
        backend: config.LLM_BACKEND,
        model: provider.defaultModel,
        root,
        maxIterations: config.AGENT_MAX_ITERATIONS,
    });

    const registry = createToolRegistry(
        buildFileTools({
            root,
            readMaxChars: config.READ_MAX_CHARS,
            summaryMaxChars: config.SUMMARY_MAX_CHARS,
            maxListed: config.LIST_MAX_SHOWN,
            maxFileBytes: config.FILE_MAX_SIZE_BYTES,
            summarizer: createLlmSummarizer(provider),
        })
    );

    const agent = createAgent({
        provider,
        registry,
        systemPrompt: loadSystemPrompt(config.SYSTEM_PROMPT_PATH),
        maxIterations: config.AGENT_MAX_ITERATIONS,
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down…`);
        process.exit(0);
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    console.log(`${provider.id === "ollama" ? "🦙" : "🤖"} Using ${providerLabel(provider)}`);
    await runChat({ agent, input: process.stdin, output: process.stdout });
}

main().catch((err) => {
    console.error("Fatal error during startup:", err);
    process.exit(1);
});
