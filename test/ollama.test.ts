import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchOllamaModels, pickTestModel, runToolSmokeTest } from "../src/ollama.js";
import { scriptedProvider, textReply, toolCallReply } from "./fakes.js";

describe("ollama helpers", () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe("fetchOllamaModels", () => {
        it("returns installed model names from /api/tags", async () => {
            const fetchMock = vi.fn(async () =>
                new Response(JSON.stringify({ models: [{ name: "qwen2.5:7b" }, { name: "llama3.2:latest" }] }), {
                    status: 200,
                })
            );
            vi.stubGlobal("fetch", fetchMock);

            expect(await fetchOllamaModels("http://localhost:11434/")).toEqual(["qwen2.5:7b", "llama3.2:latest"]);
            expect(fetchMock).toHaveBeenCalledWith(
                "http://localhost:11434/api/tags",
                expect.objectContaining({ signal: expect.any(AbortSignal) })
            );
        });

        it("treats a missing model list as empty", async () => {
            vi.stubGlobal("fetch", vi.fn(async () => new Response("{}", { status: 200 })));
            expect(await fetchOllamaModels("http://localhost:11434")).toEqual([]);
        });

        it("fails on a non-2xx status", async () => {
            vi.stubGlobal("fetch", vi.fn(async () => new Response("oops", { status: 500 })));
            await expect(fetchOllamaModels("http://localhost:11434")).rejects.toThrow(
                "HTTP 500 from http://localhost:11434/api/tags"
            );
        });
    });

    describe("pickTestModel", () => {
        it("prefers llama3.2, then the first installed model", () => {
            expect(pickTestModel(["qwen2.5:7b", "llama3.2:latest"])).toBe("llama3.2:latest");
            expect(pickTestModel(["mistral:7b", "qwen2.5:7b"])).toBe("mistral:7b");
            expect(pickTestModel([])).toBeNull();
            expect(pickTestModel(["a", "qwen2.5:7b"], "qwen")).toBe("qwen2.5:7b");
        });
    });

    describe("runToolSmokeTest", () => {
        it("reports a tool call when the model uses greet", async () => {
            const provider = scriptedProvider([
                toolCallReply([{ id: "g1", name: "greet", arguments: '{"name":"Alice"}' }]),
                textReply("I greeted Alice."),
            ]);

            expect(await runToolSmokeTest(provider)).toEqual({ toolCalled: true, reply: "I greeted Alice." });
            expect(provider.calls[1]?.at(-1)).toEqual({
                role: "tool",
                tool_call_id: "g1",
                content: "Hello, Alice! Nice to meet you.",
            });
        });

        it("reports no tool call when the model answers directly", async () => {
            const provider = scriptedProvider([textReply("Hello Alice!")]);
            expect(await runToolSmokeTest(provider)).toEqual({ toolCalled: false, reply: "Hello Alice!" });
        });
    });
});
