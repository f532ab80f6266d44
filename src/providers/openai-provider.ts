/**
 * providers/openai-provider.ts — OpenAI + OpenAI-compatible providers
 *
 * Covers: OpenAI and Ollama. Ollama serves the OpenAI API format at
 * <host>/v1 and ignores the API key, so it only needs a different baseURL.
 */

import OpenAI from "openai";
import type { LLMProvider, LLMResponse, Backend } from "./types.js";
import { logger } from "../logger.js";

const log = logger.child("llm");

function makeOpenAICompatible(
    id: Backend,
    name: string,
    defaultModel: string,
    apiKey: string,
    baseURL?: string
): LLMProvider {
    const client = new OpenAI({ apiKey, baseURL });

    return {
        id,
        name,
        defaultModel,

        async complete(messages, tools): Promise<LLMResponse> {
            log.debug(`[${id}] complete()`, { model: defaultModel, msgs: messages.length });

            const baseParams = { model: defaultModel, messages } as const;
            const response = await client.chat.completions.create(
                tools.length > 0
                    ? { ...baseParams, tools, tool_choice: "auto" as const }
                    : baseParams
            );

            const choice = response.choices[0];
            if (!choice) throw new Error(`${name} returned no choices`);

            const msg = choice.message;

            if (msg.tool_calls && msg.tool_calls.length > 0) {
                return {
                    content: null,
                    toolCalls: msg.tool_calls.map((tc) => ({
                        id: tc.id,
                        name: tc.function.name,
                        arguments: tc.function.arguments,
                    })),
                    assistantMessage: {
                        role: "assistant",
                        content: msg.content,
                        tool_calls: msg.tool_calls,
                    },
                };
            }

            return {
                content: msg.content ?? "(no response)",
                toolCalls: null,
                assistantMessage: { role: "assistant", content: msg.content },
            };
        },
    };
}

/** Factory — called with live config values so keys are read after .env loads */
export function createOpenAIProvider(apiKey: string, model: string): LLMProvider {
    return makeOpenAICompatible("openai", "OpenAI", model, apiKey);
}

export function createOllamaProvider(host: string, model: string): LLMProvider {
    return makeOpenAICompatible("ollama", "Ollama", model, "ollama", ollamaApiBase(host));
}

/** OpenAI-compatible base URL for an Ollama host: http://localhost:11434 → …/v1 */
export function ollamaApiBase(host: string): string {
    const trimmed = host.replace(/\/+$/, "");
    return trimmed.endsWith("/v1") ? trimmed : `${trimmed}/v1`;
}
