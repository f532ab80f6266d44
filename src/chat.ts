/**
 * chat.ts — Interactive terminal chat loop
 *
 * Reads one line per turn, hands it to the agent, prints the reply.
 * "exit", "quit" or "退出" end the session, as does end of input.
 * Agent errors are printed and the loop carries on.
 */

import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import type { Agent } from "./agent.js";
import { logger } from "./logger.js";

const EXIT_WORDS = new Set(["exit", "quit", "退出"]);

export function isExitCommand(line: string): boolean {
    return EXIT_WORDS.has(line.trim().toLowerCase());
}

export interface ChatOptions {
    agent: Agent;
    input: Readable;
    output: Writable;
}

export async function runChat({ agent, input, output }: ChatOptions): Promise<void> {
    const rl = createInterface({ input, output, terminal: false });
    const write = (text: string) => output.write(text);

    write("\nFile assistant ready. Type 'exit', 'quit' or '退出' to leave.\n\n");
    write("👤 You: ");

    try {
        for await (const line of rl) {
            if (isExitCommand(line)) break;

            if (line.trim()) {
                try {
                    const reply = await agent.input(line);
                    write(`🤖 Assistant: ${reply}\n\n`);
                } catch (err) {
                    logger.error("Agent turn failed", { err: String(err) });
                    write(`❌ Error: ${err instanceof Error ? err.message : String(err)}\n`);
                    write("💡 Check that the model backend is running and configured correctly.\n\n");
                }
            }
            write("👤 You: ");
        }
    } finally {
        rl.close();
    }

    write("\n👋 Goodbye!\n");
}
