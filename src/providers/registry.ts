/**
 * providers/registry.ts — Backend selection
 *
 * Supported backends:
 *   ollama   llama3.2, llama3.2:3b, qwen2.5:7b, mistral:7b, ...  (local)
 *   openai   gpt-4o-mini, gpt-4o, gpt-4-turbo, ...                (hosted)
 */

import type { Config } from "../config.js";
import type { LLMProvider } from "./types.js";
import { createOpenAIProvider, createOllamaProvider } from "./openai-provider.js";

export type ProviderConfig = Pick<
    Config,
    "LLM_BACKEND" | "OLLAMA_HOST" | "OLLAMA_MODEL" | "OPENAI_API_KEY" | "OPENAI_MODEL"
>;

/** Build the provider selected by LLM_BACKEND. Throws when it is not configured. */
export function createProvider(cfg: ProviderConfig): LLMProvider {
    switch (cfg.LLM_BACKEND) {
        case "ollama":
            return createOllamaProvider(cfg.OLLAMA_HOST, cfg.OLLAMA_MODEL);
        case "openai":
            if (!cfg.OPENAI_API_KEY) {
                throw new Error("OPENAI_API_KEY is not set (required when LLM_BACKEND=openai)");
            }
            return createOpenAIProvider(cfg.OPENAI_API_KEY, cfg.OPENAI_MODEL);
    }
}

/** Returns a display string like "Ollama · llama3.2" */
export function providerLabel(provider: LLMProvider): string {
    return `${provider.name} · ${provider.defaultModel}`;
}
