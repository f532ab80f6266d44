import { describe, it, expect, vi } from "vitest";
import { createToolRegistry, type ToolDefinition } from "../../src/tools/index.js";

function fakeTool(name: string, execute: ToolDefinition["execute"]): ToolDefinition {
    return {
        spec: {
            type: "function",
            function: {
                name,
                description: `fake ${name}`,
                parameters: { type: "object", properties: {}, additionalProperties: false },
            },
        },
        execute,
    };
}

describe("tool registry", () => {
    it("dispatches parsed arguments to the named tool", async () => {
        const execute = vi.fn(async (args: Record<string, unknown>) => `got ${String(args["directory"])}`);
        const registry = createToolRegistry([fakeTool("list_files", execute)]);

        expect(await registry.dispatch("list_files", '{"directory":"docs"}')).toBe("got docs");
        expect(execute).toHaveBeenCalledWith({ directory: "docs" });
    });

    it("treats empty arguments as an empty object", async () => {
        const execute = vi.fn(async () => "ok");
        const registry = createToolRegistry([fakeTool("count_files", execute)]);

        expect(await registry.dispatch("count_files", "  ")).toBe("ok");
        expect(execute).toHaveBeenCalledWith({});
    });

    it("exposes specs and names in registration order", () => {
        const registry = createToolRegistry([
            fakeTool("b", async () => ""),
            fakeTool("a", async () => ""),
        ]);
        expect(registry.names()).toEqual(["b", "a"]);
        expect(registry.specs().map((s) => s.function.name)).toEqual(["b", "a"]);
    });

    it("refuses duplicate tool names", () => {
        expect(() => createToolRegistry([fakeTool("x", async () => ""), fakeTool("x", async () => "")])).toThrow(
            'Duplicate tool name "x"'
        );
    });

    it("turns every failure into an error string", async () => {
        const registry = createToolRegistry([
            fakeTool("explode", async () => {
                throw new Error("kaboom");
            }),
        ]);

        expect(await registry.dispatch("missing", "{}")).toBe('Error: unknown tool "missing"');
        expect(await registry.dispatch("explode", "{not json")).toBe(
            "Error: could not parse arguments as JSON: {not json"
        );
        expect(await registry.dispatch("explode", "[1,2]")).toBe(
            'Error: arguments for "explode" must be a JSON object'
        );
        expect(await registry.dispatch("explode", "{}")).toBe('Error executing "explode": Error: kaboom');
    });
});
