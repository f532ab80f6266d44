import { describe, it, expect, vi, beforeEach } from "vitest";
import { createOllamaProvider, createOpenAIProvider, ollamaApiBase } from "../../src/providers/openai-provider.js";
import { createProvider, providerLabel } from "../../src/providers/registry.js";

const { create, construct } = vi.hoisted(() => ({
    create: vi.fn(),
    construct: vi.fn(),
}));

vi.mock("openai", () => ({
    default: class {
        chat = { completions: { create } };
        constructor(options: unknown) {
            construct(options);
        }
    },
}));

const tool = {
    type: "function" as const,
    function: { name: "list_files", parameters: { type: "object", properties: {} } },
};

describe("OpenAI-compatible provider", () => {
    beforeEach(() => {
        create.mockReset();
        construct.mockReset();
    });

    it("points Ollama at the /v1 endpoint with a placeholder key", () => {
        createOllamaProvider("http://localhost:11434", "llama3.2");
        expect(construct).toHaveBeenCalledWith({ apiKey: "ollama", baseURL: "http://localhost:11434/v1" });
    });

    it("normalizes Ollama base URLs", () => {
        expect(ollamaApiBase("http://localhost:11434/")).toBe("http://localhost:11434/v1");
        expect(ollamaApiBase("http://gpu-box:11434/v1")).toBe("http://gpu-box:11434/v1");
    });

    it("returns plain text replies", async () => {
        create.mockResolvedValue({ choices: [{ message: { role: "assistant", content: "hi" } }] });
        const provider = createOpenAIProvider("test-key", "gpt-4o-mini");
        const messages = [{ role: "user" as const, content: "hello" }];

        expect(await provider.complete(messages, [])).toEqual({
            content: "hi",
            toolCalls: null,
            assistantMessage: { role: "assistant", content: "hi" },
        });
        expect(create).toHaveBeenCalledWith({ model: "gpt-4o-mini", messages });
    });

    it("maps tool calls and sends tools with tool_choice auto", async () => {
        const toolCalls = [
            { id: "call_1", type: "function", function: { name: "list_files", arguments: '{"directory":"."}' } },
        ];
        create.mockResolvedValue({
            choices: [{ message: { role: "assistant", content: null, tool_calls: toolCalls } }],
        });
        const provider = createOllamaProvider("http://localhost:11434", "llama3.2");
        const messages = [{ role: "user" as const, content: "list" }];

        const result = await provider.complete(messages, [tool]);

        expect(result.toolCalls).toEqual([{ id: "call_1", name: "list_files", arguments: '{"directory":"."}' }]);
        expect(result.assistantMessage).toEqual({ role: "assistant", content: null, tool_calls: toolCalls });
        expect(create).toHaveBeenCalledWith({ model: "llama3.2", messages, tools: [tool], tool_choice: "auto" });
    });

    it("fails when the backend returns no choices", async () => {
        create.mockResolvedValue({ choices: [] });
        const provider = createOllamaProvider("http://localhost:11434", "llama3.2");
        await expect(provider.complete([], [])).rejects.toThrow("Ollama returned no choices");
    });
});

describe("provider registry", () => {
    const base = {
        OLLAMA_HOST: "http://localhost:11434",
        OLLAMA_MODEL: "llama3.2",
        OPENAI_API_KEY: "",
        OPENAI_MODEL: "gpt-4o-mini",
    };

    it("builds the configured backend", () => {
        expect(providerLabel(createProvider({ ...base, LLM_BACKEND: "ollama" }))).toBe("Ollama · llama3.2");
        expect(providerLabel(createProvider({ ...base, LLM_BACKEND: "openai", OPENAI_API_KEY: "test-key" }))).toBe(
            "OpenAI · gpt-4o-mini"
        );
    });

    it("requires an API key for the hosted backend", () => {
        expect(() => createProvider({ ...base, LLM_BACKEND: "openai" })).toThrow("OPENAI_API_KEY is not set");
    });
});
