/**
 * providers/types.ts — Unified LLM provider interface
 *
 * The agent loop and the summarizer only speak this interface. Messages are
 * kept in OpenAI format; both supported backends (Ollama's compatible
 * endpoint and the hosted API) take that format natively.
 */

import type { ChatCompletionMessageParam, ChatCompletionTool } from "openai/resources/chat/completions";

export type Backend = "ollama" | "openai";

export interface ToolCall {
    id: string;
    name: string;
    arguments: string; // raw JSON string
}

export interface LLMResponse {
    /** Text content of the reply (null when tool calls are present) */
    content: string | null;
    /** Tool calls requested by the model (null when text reply is present) */
    toolCalls: ToolCall[] | null;
    /** The assistant message in OpenAI format, ready to push onto history. */
    assistantMessage: ChatCompletionMessageParam;
}

export interface LLMProvider {
    readonly id: Backend;
    /** Human-friendly display name */
    readonly name: string;
    /** Model every request is sent to */
    readonly defaultModel: string;

    complete(
        messages: ChatCompletionMessageParam[],
        tools: ChatCompletionTool[]
    ): Promise<LLMResponse>;
}
