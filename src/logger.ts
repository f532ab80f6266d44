/**
 * logger.ts — Structured, level-aware console logger.
 * Timestamps every line. Writes to stderr so log lines never interleave
 * with the chat transcript on stdout. Never logs secrets.
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const COLORS: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m",  // cyan
    warn: "\x1b[33m",  // yellow
    error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export interface Logger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
    /** A logger whose lines carry a `[scope]` tag */
    child(scope: string): Logger;
}

function format(level: LogLevel, scope: string | null, message: string, meta?: unknown): string {
    const ts = new Date().toISOString();
    const color = COLORS[level];
    const label = level.toUpperCase().padEnd(5);
    const tag = scope ? `[${scope}] ` : "";
    const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : "";
    return `${color}[${ts}] ${label}${RESET} ${tag}${message}${metaStr}`;
}

export function createLogger(minLevel: LogLevel, scope: string | null = null): Logger {
    const emit = (level: LogLevel, message: string, meta?: unknown) => {
        if (LEVELS[level] >= LEVELS[minLevel]) {
            process.stderr.write(format(level, scope, message, meta) + "\n");
        }
    };

    return {
        debug: (message, meta) => emit("debug", message, meta),
        info: (message, meta) => emit("info", message, meta),
        warn: (message, meta) => emit("warn", message, meta),
        error: (message, meta) => emit("error", message, meta),
        child: (child) => createLogger(minLevel, scope ? `${scope}:${child}` : child),
    };
}

export const logger = createLogger(config.LOG_LEVEL);
