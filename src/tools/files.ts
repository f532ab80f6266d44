/**
 * tools/files.ts — File inspection tools exposed to the model
 *
 * Wraps the read-only core in tools/inspect.ts as five function-calling tools:
 * list_files, read_file, search_files, count_files, summarize_file.
 * Arguments are validated with zod; every outcome, including failures, is
 * rendered as text for the model.
 */

import { z } from "zod";
import { logger } from "../logger.js";
import {
    listFiles,
    readFile,
    searchFiles,
    countFiles,
    excerptForSummary,
    normalizeExtension,
    DEFAULT_READ_MAX_CHARS,
    DEFAULT_SUMMARY_MAX_CHARS,
    type FileExcerpt,
    type InspectContext,
    type InspectError,
} from "./inspect.js";
import type { ToolDefinition } from "./index.js";

/** Content shorter than this is returned as-is instead of being summarized. */
export const SHORT_CONTENT_CHARS = 100;

export type Summarizer = (excerpt: FileExcerpt) => Promise<string>;

export interface FileToolOptions {
    /** Confinement root for every path argument */
    root: string;
    readMaxChars?: number;
    summaryMaxChars?: number;
    /** Max entries shown in a listing or search result */
    maxListed?: number;
    maxFileBytes?: number;
    /** Model-backed summarizer for summarize_file. Without one, the excerpt is returned. */
    summarizer?: Summarizer;
}

// ── Argument schemas ─────────────────────────────────────────────────────────

const listArgs = z.object({
    directory: z.string().default("."),
    extension: z.string().optional(),
    recursive: z.boolean().default(false),
});

const readArgs = z.object({
    file_path: z.string().min(1, "'file_path' is required"),
    max_chars: z.number().int().nonnegative().optional(),
});

const searchArgs = z.object({
    directory: z.string().default("."),
    keyword: z.string().min(1, "'keyword' is required"),
    recursive: z.boolean().default(false),
});

const summarizeArgs = z.object({
    file_path: z.string().min(1, "'file_path' is required"),
    max_chars: z.number().int().positive().optional(),
});

function parseArgs<T extends z.ZodTypeAny>(
    schema: T,
    args: Record<string, unknown>
): { ok: true; data: z.output<T> } | { ok: false; reason: string } {
    const result = schema.safeParse(args);
    if (result.success) return { ok: true, data: result.data };
    const issues = result.error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");
    return { ok: false, reason: `❌ InvalidArgument: ${issues}` };
}

function renderError(err: InspectError): string {
    return `❌ ${err.kind}: ${err.message}`;
}

// ── Rendering ────────────────────────────────────────────────────────────────

function scopeNote(recursive: boolean, extension?: string): string {
    const parts: string[] = [];
    if (recursive) parts.push("including subdirectories");
    const ext = normalizeExtension(extension);
    if (ext) parts.push(`extension ${ext}`);
    return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

function extensionOf(path: string): string {
    const name = path.slice(path.lastIndexOf("/") + 1);
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(dot).toLowerCase() : "(none)";
}

/** Extension breakdown, most common first; ties keep first-seen order. */
export function extensionStats(files: string[]): Array<{ extension: string; count: number }> {
    const counts = new Map<string, number>();
    for (const f of files) {
        const ext = extensionOf(f);
        counts.set(ext, (counts.get(ext) ?? 0) + 1);
    }
    return [...counts.entries()]
        .map(([extension, count]) => ({ extension, count }))
        .sort((a, b) => b.count - a.count);
}

export function renderListing(
    directory: string,
    files: string[],
    opts: { recursive: boolean; extension?: string; maxListed: number }
): string {
    const scope = scopeNote(opts.recursive, opts.extension);
    if (files.length === 0) return `📂 No files found in ${directory}${scope}`;

    if (files.length <= opts.maxListed) {
        const lines = files.map((f) => `  - ${f}`);
        return `📂 Found ${files.length} file(s) in ${directory}${scope}:\n${lines.join("\n")}`;
    }

    const stats = extensionStats(files).map(({ extension, count }) => {
        const pct = ((count / files.length) * 100).toFixed(1);
        return `  ${extension}: ${count} (${pct}%)`;
    });
    const sample = files.slice(0, opts.maxListed).map((f) => `  - ${f}`);

    return (
        `📂 Found ${files.length} file(s) in ${directory}${scope}\n\n` +
        `📊 By extension:\n${stats.join("\n")}\n\n` +
        `📝 First ${opts.maxListed} files:\n${sample.join("\n")}\n\n` +
        `💡 Too many files to show them all. Use the extension argument to narrow the listing.`
    );
}

function renderExcerpt(excerpt: FileExcerpt): string {
    if (!excerpt.truncated) {
        return `📄 ${excerpt.path} (${excerpt.totalChars} chars):\n\n${excerpt.content}`;
    }
    return (
        `📄 ${excerpt.path} (${excerpt.totalChars} chars, showing the first ${excerpt.maxChars}):\n\n` +
        `${excerpt.content}\n…[truncated]`
    );
}

// ── Tools ────────────────────────────────────────────────────────────────────

export function buildFileTools(options: FileToolOptions): ToolDefinition[] {
    const ctx: InspectContext = { root: options.root, maxFileBytes: options.maxFileBytes };
    const readMaxChars = options.readMaxChars ?? DEFAULT_READ_MAX_CHARS;
    const summaryMaxChars = options.summaryMaxChars ?? DEFAULT_SUMMARY_MAX_CHARS;
    const maxListed = options.maxListed ?? 50;

    const listFilesTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "list_files",
                description:
                    "List the files in a directory, sorted by path. " +
                    "Optionally filter by extension and descend into subdirectories.",
                parameters: {
                    type: "object",
                    properties: {
                        directory: {
                            type: "string",
                            description: "Directory to list, relative to the workspace root. Defaults to '.'.",
                        },
                        extension: {
                            type: "string",
                            description: "Only list files with this extension, e.g. '.py' or '.txt'. Case-insensitive.",
                        },
                        recursive: {
                            type: "boolean",
                            description: "Whether to include subdirectories. Defaults to false.",
                        },
                    },
                    required: ["directory"],
                    additionalProperties: false,
                },
            },
        },

        async execute(args) {
            const parsed = parseArgs(listArgs, args);
            if (!parsed.ok) return parsed.reason;
            const { directory, extension, recursive } = parsed.data;

            logger.info("list_files", { directory, extension, recursive });
            const result = listFiles(ctx, { directory, extension, recursive });
            if (!result.ok) return renderError(result);

            return renderListing(directory, result.value, { recursive, extension, maxListed });
        },
    };

    const readFileTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "read_file",
                description:
                    "Read the text content of a file. Long files are truncated. " +
                    "Binary files are rejected.",
                parameters: {
                    type: "object",
                    properties: {
                        file_path: {
                            type: "string",
                            description: "Path to the file, relative to the workspace root.",
                        },
                        max_chars: {
                            type: "integer",
                            description: `Maximum characters to return. Defaults to ${readMaxChars}.`,
                        },
                    },
                    required: ["file_path"],
                    additionalProperties: false,
                },
            },
        },

        async execute(args) {
            const parsed = parseArgs(readArgs, args);
            if (!parsed.ok) return parsed.reason;
            const { file_path, max_chars } = parsed.data;

            logger.info("read_file", { file_path, max_chars });
            const result = readFile(ctx, file_path, max_chars ?? readMaxChars);
            if (!result.ok) return renderError(result);

            return renderExcerpt(result.value);
        },
    };

    const searchFilesTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "search_files",
                description:
                    "Find files whose text contains a keyword (case-insensitive). " +
                    "Returns each matching file with the line of the first occurrence. " +
                    "Binary files are skipped.",
                parameters: {
                    type: "object",
                    properties: {
                        directory: {
                            type: "string",
                            description: "Directory to search, relative to the workspace root.",
                        },
                        keyword: {
                            type: "string",
                            description: "Text to look for.",
                        },
                        recursive: {
                            type: "boolean",
                            description: "Whether to search subdirectories. Defaults to false.",
                        },
                    },
                    required: ["directory", "keyword"],
                    additionalProperties: false,
                },
            },
        },

        async execute(args) {
            const parsed = parseArgs(searchArgs, args);
            if (!parsed.ok) return parsed.reason;
            const { directory, keyword, recursive } = parsed.data;

            logger.info("search_files", { directory, keyword, recursive });
            const result = searchFiles(ctx, { directory, keyword, recursive });
            if (!result.ok) return renderError(result);

            const scope = scopeNote(recursive);
            const matches = result.value;
            if (matches.length === 0) {
                return `🔍 No files in ${directory} contain "${keyword}"${scope}`;
            }

            const lines = matches.slice(0, maxListed).map((m) => `${m.path}:${m.line}: ${m.preview}`);
            const more = matches.length > maxListed
                ? `\n\n💡 ${matches.length - maxListed} more matching file(s) not shown.`
                : "";
            return (
                `🔍 Found ${matches.length} file(s) in ${directory} containing "${keyword}"${scope}:\n\n` +
                `${lines.join("\n")}${more}`
            );
        },
    };

    const countFilesTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "count_files",
                description:
                    "Count the files in a directory, with the same extension and recursion rules as list_files.",
                parameters: {
                    type: "object",
                    properties: {
                        directory: {
                            type: "string",
                            description: "Directory to count in, relative to the workspace root.",
                        },
                        extension: {
                            type: "string",
                            description: "Only count files with this extension. Case-insensitive.",
                        },
                        recursive: {
                            type: "boolean",
                            description: "Whether to include subdirectories. Defaults to false.",
                        },
                    },
                    required: ["directory"],
                    additionalProperties: false,
                },
            },
        },

        async execute(args) {
            const parsed = parseArgs(listArgs, args);
            if (!parsed.ok) return parsed.reason;
            const { directory, extension, recursive } = parsed.data;

            logger.info("count_files", { directory, extension, recursive });
            const result = countFiles(ctx, { directory, extension, recursive });
            if (!result.ok) return renderError(result);

            return `🔢 ${directory} contains ${result.value} file(s)${scopeNote(recursive, extension)}`;
        },
    };

    const summarizeFileTool: ToolDefinition = {
        spec: {
            type: "function",
            function: {
                name: "summarize_file",
                description:
                    "Summarize the content of a text file in a few sentences. " +
                    "Very long files are summarized from their beginning.",
                parameters: {
                    type: "object",
                    properties: {
                        file_path: {
                            type: "string",
                            description: "Path to the file, relative to the workspace root.",
                        },
                        max_chars: {
                            type: "integer",
                            description: `Maximum characters passed to the summarizer. Defaults to ${summaryMaxChars}.`,
                        },
                    },
                    required: ["file_path"],
                    additionalProperties: false,
                },
            },
        },

        async execute(args) {
            const parsed = parseArgs(summarizeArgs, args);
            if (!parsed.ok) return parsed.reason;
            const { file_path, max_chars } = parsed.data;

            logger.info("summarize_file", { file_path, max_chars });
            const result = excerptForSummary(ctx, file_path, max_chars ?? summaryMaxChars);
            if (!result.ok) return renderError(result);

            const excerpt = result.value;
            if (excerpt.totalChars < SHORT_CONTENT_CHARS) {
                return `📄 ${excerpt.path} is short, full content:\n\n${excerpt.content}`;
            }

            if (!options.summarizer) {
                return `${renderExcerpt(excerpt)}\n\nSummarize the content above in 3-5 sentences.`;
            }

            const note = excerpt.truncated
                ? `\n\n💡 The file has ${excerpt.totalChars} chars; the summary covers the first ${excerpt.maxChars}.`
                : "";

            try {
                const summary = await options.summarizer(excerpt);
                return `📄 Summary of ${excerpt.path}:\n${summary}${note}`;
            } catch (err) {
                logger.warn("summarize_file failed", { file_path, err: String(err) });
                return `❌ Could not summarize ${excerpt.path}: ${String(err)}`;
            }
        },
    };

    return [listFilesTool, readFileTool, searchFilesTool, countFilesTool, summarizeFileTool];
}
