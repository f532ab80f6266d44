/**
 * config.ts — Environment validation using Zod
 * Validated on startup. The process exits immediately if anything is invalid.
 * Every key has a default, so a fresh checkout runs against a local Ollama.
 * Secrets live in .env only — never in code or logs.
 */

import { z } from "zod";
import "dotenv/config";

const positiveInt = (fallback: string) =>
    z
        .string()
        .regex(/^\d+$/, "must be a whole number")
        .transform(Number)
        .refine((n) => n > 0, "must be greater than zero")
        .default(fallback);

export const envSchema = z.object({
    /** Which model backend to talk to */
    LLM_BACKEND: z.enum(["ollama", "openai"]).default("ollama"),

    // ── Ollama (OpenAI-compatible endpoint at <host>/v1) ──────────────────────

    /** Ollama server address, without the /v1 suffix */
    OLLAMA_HOST: z.string().url().default("http://localhost:11434"),

    /** Local model name, e.g. llama3.2, llama3.2:3b, qwen2.5:7b */
    OLLAMA_MODEL: z.string().min(1).default("llama3.2"),

    // ── OpenAI ────────────────────────────────────────────────────────────────

    /** OpenAI API key — required when LLM_BACKEND=openai */
    OPENAI_API_KEY: z.string().default(""),

    /** Hosted model name */
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),

    // ── Agent ─────────────────────────────────────────────────────────────────

    /** Maximum agentic tool-call iterations per turn */
    AGENT_MAX_ITERATIONS: positiveInt("10"),

    /** System prompt file; a built-in prompt is used when it is missing */
    SYSTEM_PROMPT_PATH: z.string().default("./prompt.md"),

    // ── File inspection tools ─────────────────────────────────────────────────

    /** Directory every file tool is confined to */
    FILE_ROOT: z.string().min(1).default("."),

    /** Files above this size (bytes) are skipped by search_files (default 1 MB) */
    FILE_MAX_SIZE_BYTES: positiveInt("1048576"),

    /** Default truncation ceiling for read_file */
    READ_MAX_CHARS: positiveInt("5000"),

    /** Default truncation ceiling for summarize_file */
    SUMMARY_MAX_CHARS: positiveInt("10000"),

    /** Max entries shown by list_files / search_files before summarizing */
    LIST_MAX_SHOWN: positiveInt("50"),

    /** Log level */
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof envSchema>;

export function parseEnv(env: NodeJS.ProcessEnv = process.env): Config {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        console.error("❌ Invalid environment configuration:\n");
        for (const issue of result.error.issues) {
            console.error(`  • ${issue.path.join(".")}: ${issue.message}`);
        }
        console.error("\nCopy .env.example to .env and fix the values above.\n");
        process.exit(1);
    }
    return result.data;
}

export const config = parseEnv();
