/**
 * tools/index.ts — Tool registry
 *
 * Tools are registered here and exposed to the OpenAI function-calling API.
 * Each tool declares its JSON Schema for parameters and an execute() handler.
 * Dispatch never throws: every failure comes back as an "Error: ..." string
 * the model can read.
 */

import type OpenAI from "openai";

export interface ToolDefinition {
    /** The OpenAI function specification */
    spec: OpenAI.Chat.Completions.ChatCompletionTool;
    /** Execute the tool and return a string result */
    execute(args: Record<string, unknown>): Promise<string>;
}

export interface ToolRegistry {
    /** Build the array to pass into OpenAI chat completions */
    specs(): OpenAI.Chat.Completions.ChatCompletionTool[];
    names(): string[];
    /** Dispatch a function call by name */
    dispatch(name: string, rawArgs: string): Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createToolRegistry(tools: ToolDefinition[]): ToolRegistry {
    const byName = new Map<string, ToolDefinition>();
    for (const tool of tools) {
        const name = tool.spec.function.name;
        if (byName.has(name)) throw new Error(`Duplicate tool name "${name}"`);
        byName.set(name, tool);
    }

    return {
        specs() {
            return tools.map((t) => t.spec);
        },

        names() {
            return [...byName.keys()];
        },

        async dispatch(name, rawArgs) {
            const tool = byName.get(name);
            if (!tool) return `Error: unknown tool "${name}"`;

            let args: unknown;
            try {
                // Some local models send an empty string for no-argument calls
                args = rawArgs.trim() ? JSON.parse(rawArgs) : {};
            } catch {
                return `Error: could not parse arguments as JSON: ${rawArgs}`;
            }
            if (!isRecord(args)) return `Error: arguments for "${name}" must be a JSON object`;

            try {
                return await tool.execute(args);
            } catch (err) {
                return `Error executing "${name}": ${String(err)}`;
            }
        },
    };
}
