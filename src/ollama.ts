/**
 * ollama.ts — Helpers for checking a local Ollama setup
 *
 * Used by check-ollama.ts: is the server up, which models are pulled, and
 * can the chosen model drive a tool call end to end.
 */

import { z } from "zod";
import { createAgent } from "./agent.js";
import { createToolRegistry, type ToolDefinition } from "./tools/index.js";
import type { LLMProvider } from "./providers/types.js";

export const PREFERRED_TEST_MODEL = "llama3.2";

const TAGS_TIMEOUT_MS = 2000;

const tagsResponse = z.object({
    models: z.array(z.object({ name: z.string() })).default([]),
});

/** GET <host>/api/tags and return the installed model names. */
export async function fetchOllamaModels(host: string): Promise<string[]> {
    const url = `${host.replace(/\/+$/, "")}/api/tags`;
    const response = await fetch(url, { signal: AbortSignal.timeout(TAGS_TIMEOUT_MS) });
    if (!response.ok) throw new Error(`HTTP ${response.status} from ${url}`);

    const parsed = tagsResponse.safeParse(await response.json());
    if (!parsed.success) throw new Error(`Unexpected response from ${url}`);
    return parsed.data.models.map((m) => m.name);
}

/** First model whose name contains `preferred`, else the first model, else null. */
export function pickTestModel(names: string[], preferred: string = PREFERRED_TEST_MODEL): string | null {
    return names.find((n) => n.includes(preferred)) ?? names[0] ?? null;
}

export interface SmokeTestResult {
    toolCalled: boolean;
    reply: string;
}

/** Ask the model to greet someone through a `greet` tool and report whether it used it. */
export async function runToolSmokeTest(provider: LLMProvider, name = "Alice"): Promise<SmokeTestResult> {
    let toolCalled = false;

    const greetTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "greet",
                description: "Greet someone by name.",
                parameters: {
                    type: "object",
                    properties: {
                        name: { type: "string", description: "Who to greet." },
                    },
                    required: ["name"],
                    additionalProperties: false,
                },
            },
        },
        async execute(args) {
            toolCalled = true;
            return `Hello, ${String(args["name"] ?? "")}! Nice to meet you.`;
        },
    };

    const agent = createAgent({
        provider,
        registry: createToolRegistry([greetTool]),
        systemPrompt: "You are a friendly assistant. When asked to greet someone, use the greet tool.",
        maxIterations: 3,
    });

    const reply = await agent.input(`Please greet ${name}.`);
    return { toolCalled, reply };
}
