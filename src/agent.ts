/**
 * agent.ts — The agentic loop
 *
 *   1. Sends system prompt + conversation history + available tools to the LLM
 *   2. If the LLM requests tool calls, executes them and feeds results back
 *   3. Repeats until the LLM sends a plain text reply OR the max-iterations cap is hit
 *
 * Tool errors come back from the registry as result strings (never thrown).
 * Provider errors propagate to the caller; history is left as it was before the turn.
 */

import { readFileSync } from "fs";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { logger } from "./logger.js";
import type { LLMProvider } from "./providers/types.js";
import type { ToolRegistry } from "./tools/index.js";

const log = logger.child("agent");

export const MAX_ITERATIONS_REPLY =
    "⚠️ I hit my maximum tool-call limit for this turn. Please try again or rephrase your request.";

export const DEFAULT_SYSTEM_PROMPT = `You are a file assistant running on the user's machine.
You can inspect files inside the workspace with these tools:
- list_files(directory, extension?, recursive?): list files, sorted by path
- read_file(file_path, max_chars?): read a text file (long files are truncated)
- search_files(directory, keyword, recursive?): find files whose content contains a keyword
- count_files(directory, extension?, recursive?): count files
- summarize_file(file_path, max_chars?): summarize a text file

Rules:
- Always use a tool to answer questions about files; never guess file names or contents
- Paths are relative to the workspace root; paths outside it are rejected
- Tell the user when a file is truncated, missing or not a text file
- Answer in the language the user writes in`;

/** Read the system prompt file, falling back to the built-in prompt. */
export function loadSystemPrompt(path: string): string {
    try {
        const text = readFileSync(path, "utf-8").trim();
        if (text) {
            log.info("System prompt loaded", { path, chars: text.length });
            return text;
        }
    } catch {
        // missing file: fall through
    }
    log.warn("System prompt file not found — using the built-in prompt", { path });
    return DEFAULT_SYSTEM_PROMPT;
}

export interface AgentOptions {
    provider: LLMProvider;
    registry: ToolRegistry;
    systemPrompt: string;
    maxIterations: number;
}

export interface Agent {
    /** Run one full agentic turn and return the final reply */
    input(message: string): Promise<string>;
    /** Conversation so far, without the system prompt */
    history(): ChatCompletionMessageParam[];
    reset(): void;
}

export function createAgent(options: AgentOptions): Agent {
    const { provider, registry, systemPrompt, maxIterations } = options;
    let history: ChatCompletionMessageParam[] = [];

    async function runTurn(userMessage: string): Promise<string> {
        const messages: ChatCompletionMessageParam[] = [
            { role: "system", content: systemPrompt },
            ...history,
            { role: "user", content: userMessage },
        ];

        const tools = registry.specs();
        let iterations = 0;

        while (iterations < maxIterations) {
            iterations++;
            log.debug(`Agent loop iteration ${iterations}`, { messages: messages.length });

            const result = await provider.complete(messages, tools);
            messages.push(result.assistantMessage);

            // No tool calls → final reply
            if (!result.toolCalls || result.toolCalls.length === 0) {
                const reply = result.content ?? "(no response)";
                log.debug("Agent loop finished", { iterations, provider: provider.id });
                history = messages.slice(1);
                return reply;
            }

            // Execute all tool calls in parallel
            log.info(`Executing ${result.toolCalls.length} tool call(s)`, {
                tools: result.toolCalls.map((c) => c.name),
            });
            const toolResults = await Promise.all(
                result.toolCalls.map(async (call) => {
                    const output = await registry.dispatch(call.name, call.arguments);
                    log.debug("Tool result", { name: call.name, chars: output.length });
                    return {
                        role: "tool" as const,
                        tool_call_id: call.id,
                        content: output,
                    };
                })
            );

            messages.push(...toolResults);
        }

        log.warn("Agent max iterations reached", { max: maxIterations });
        history = messages.slice(1);
        return MAX_ITERATIONS_REPLY;
    }

    return {
        input: runTurn,
        history: () => [...history],
        reset() {
            history = [];
        },
    };
}
