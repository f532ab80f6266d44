/**
 * tools/inspect.ts — Read-only file inspection core
 *
 * Five stateless operations over a directory tree: list, read, search, count,
 * and excerpt-for-summary. Every path is confined to `ctx.root` before any
 * other filesystem access. Failures come back as values, never as throws.
 *
 * Policies:
 *   - Extension filters and keyword search are case-insensitive
 *   - Listings and search results are sorted by path (UTF-16 code unit order)
 */

import { readdirSync, readFileSync, realpathSync, statSync, existsSync } from "fs";
import type { Dirent } from "fs";
import { resolve, relative, isAbsolute, join, sep } from "path";

export const DEFAULT_READ_MAX_CHARS = 5000;
export const DEFAULT_SUMMARY_MAX_CHARS = 10000;
export const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;
export const PREVIEW_MAX_CHARS = 120;

// ── Result types ─────────────────────────────────────────────────────────────

export type InspectErrorKind = "NotFound" | "NotReadable" | "InvalidArgument";

export interface InspectError {
    ok: false;
    kind: InspectErrorKind;
    message: string;
}

export type InspectResult<T> = { ok: true; value: T } | InspectError;

export interface InspectContext {
    /** Confinement root. Relative paths resolve against it. */
    root: string;
    /** Files larger than this are skipped by search. */
    maxFileBytes?: number;
}

export interface FileFilter {
    directory: string;
    extension?: string;
    recursive?: boolean;
}

export interface FileExcerpt {
    /** Path relative to the root, `/`-separated */
    path: string;
    content: string;
    truncated: boolean;
    totalChars: number;
    maxChars: number;
}

export interface SearchMatch {
    path: string;
    /** 1-based line of the first occurrence */
    line: number;
    preview: string;
}

function fail(kind: InspectErrorKind, message: string): InspectError {
    return { ok: false, kind, message };
}

function ok<T>(value: T): InspectResult<T> {
    return { ok: true, value };
}

function toPosix(p: string): string {
    return p.split(sep).join("/");
}

// ── Path confinement ─────────────────────────────────────────────────────────

function isInside(root: string, target: string): boolean {
    const rel = relative(root, target);
    return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * Resolve `target` against the root and reject anything that lands outside it,
 * including symlinks whose real path escapes.
 */
export function resolveWithinRoot(ctx: InspectContext, target: string): InspectResult<string> {
    const root = resolve(ctx.root);
    const abs = resolve(root, target.trim());

    if (!isInside(root, abs)) {
        return fail("InvalidArgument", `Path "${target}" is outside the allowed root ${root}`);
    }

    if (existsSync(abs)) {
        try {
            if (!isInside(realpathSync(root), realpathSync(abs))) {
                return fail("InvalidArgument", `Path "${target}" resolves outside the allowed root ${root}`);
            }
        } catch (err) {
            return fail("NotReadable", `Cannot resolve "${target}": ${String(err)}`);
        }
    }

    return ok(abs);
}

function displayPath(ctx: InspectContext, abs: string): string {
    const rel = toPosix(relative(resolve(ctx.root), abs));
    return rel === "" ? "." : rel;
}

function resolveDirectory(ctx: InspectContext, directory: string): InspectResult<string> {
    const check = resolveWithinRoot(ctx, directory);
    if (!check.ok) return check;

    if (!existsSync(check.value)) return fail("NotFound", `Directory "${directory}" does not exist`);
    if (!statSync(check.value).isDirectory()) {
        return fail("NotFound", `Path "${directory}" is not a directory`);
    }
    return check;
}

function resolveFile(ctx: InspectContext, filePath: string): InspectResult<string> {
    const check = resolveWithinRoot(ctx, filePath);
    if (!check.ok) return check;

    if (!existsSync(check.value)) return fail("NotFound", `File "${filePath}" does not exist`);
    if (!statSync(check.value).isFile()) return fail("NotFound", `Path "${filePath}" is not a file`);
    return check;
}

// ── Walking ──────────────────────────────────────────────────────────────────

/** Lower-cased, dot-prefixed extension, or null when no filter applies. */
export function normalizeExtension(extension: string | undefined): string | null {
    const trimmed = extension?.trim().toLowerCase() ?? "";
    if (!trimmed) return null;
    return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/** Real path of the root, against which symlinked entries are checked. */
function realRoot(ctx: InspectContext): InspectResult<string> {
    try {
        return ok(realpathSync(resolve(ctx.root)));
    } catch (err) {
        return fail("NotFound", `Root "${ctx.root}" cannot be resolved: ${String(err)}`);
    }
}

/** Regular files, plus symlinks to regular files that stay under `rootReal`. */
function isFileEntry(dir: string, entry: Dirent, rootReal: string): boolean {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    try {
        const target = realpathSync(join(dir, entry.name));
        return isInside(rootReal, target) && statSync(target).isFile();
    } catch {
        return false; // dangling link
    }
}

/**
 * Collect files under `base` as `/`-separated paths relative to it. Unsorted.
 * Symlinked directories are never descended.
 */
function walk(base: string, rootReal: string, recursive: boolean, prefix = ""): string[] {
    const dir = prefix ? join(base, prefix) : base;
    let entries: Dirent[];
    try {
        entries = readdirSync(dir, { withFileTypes: true });
    } catch {
        return [];
    }

    const files: string[] = [];
    for (const entry of entries) {
        const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
            if (recursive) files.push(...walk(base, rootReal, recursive, rel));
        } else if (isFileEntry(dir, entry, rootReal)) {
            files.push(rel);
        }
    }
    return files;
}

function byPath(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

// ── Decoding ─────────────────────────────────────────────────────────────────

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Decode a file as UTF-8 text, or report why it is not text. */
function readText(abs: string, label: string): InspectResult<string> {
    let buf: Buffer;
    try {
        buf = readFileSync(abs);
    } catch (err) {
        return fail("NotReadable", `Cannot read "${label}": ${String(err)}`);
    }

    if (buf.includes(0)) return fail("NotReadable", `"${label}" looks like a binary file`);

    try {
        return ok(utf8.decode(buf));
    } catch {
        return fail("NotReadable", `"${label}" is not valid UTF-8 text`);
    }
}

function validateCeiling(maxChars: number): InspectError | null {
    if (!Number.isInteger(maxChars) || maxChars < 0) {
        return fail("InvalidArgument", `max_chars must be a non-negative integer, got ${maxChars}`);
    }
    return null;
}

/** Cut at `maxChars` UTF-16 units without leaving half a surrogate pair. */
function truncate(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    let cut = text.slice(0, maxChars);
    const last = cut.charCodeAt(cut.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) cut = cut.slice(0, -1);
    return cut;
}

// ── Operations ───────────────────────────────────────────────────────────────

export function listFiles(ctx: InspectContext, filter: FileFilter): InspectResult<string[]> {
    const dir = resolveDirectory(ctx, filter.directory);
    if (!dir.ok) return dir;

    const rootReal = realRoot(ctx);
    if (!rootReal.ok) return rootReal;

    const ext = normalizeExtension(filter.extension);
    const files = walk(dir.value, rootReal.value, filter.recursive ?? false)
        .filter((f) => ext === null || f.toLowerCase().endsWith(ext))
        .sort(byPath);
    return ok(files);
}

export function countFiles(ctx: InspectContext, filter: FileFilter): InspectResult<number> {
    const listed = listFiles(ctx, filter);
    if (!listed.ok) return listed;
    return ok(listed.value.length);
}

export function readFile(
    ctx: InspectContext,
    filePath: string,
    maxChars: number = DEFAULT_READ_MAX_CHARS
): InspectResult<FileExcerpt> {
    const bad = validateCeiling(maxChars);
    if (bad) return bad;

    const file = resolveFile(ctx, filePath);
    if (!file.ok) return file;

    const text = readText(file.value, filePath);
    if (!text.ok) return text;

    const content = text.value;
    return ok({
        path: displayPath(ctx, file.value),
        content: truncate(content, maxChars),
        truncated: content.length > maxChars,
        totalChars: content.length,
        maxChars,
    });
}

/** Same contract as readFile, sized for handing to a summarizer. */
export function excerptForSummary(
    ctx: InspectContext,
    filePath: string,
    maxChars: number = DEFAULT_SUMMARY_MAX_CHARS
): InspectResult<FileExcerpt> {
    return readFile(ctx, filePath, maxChars);
}

/**
 * Build a one-line preview around `index`. Lines longer than the preview
 * limit are windowed around the match with an ellipsis on each cut side;
 * the ellipses count toward the limit.
 */
export function buildPreview(text: string, index: number, keywordLength: number): { line: number; preview: string } {
    const at = Math.min(Math.max(index, 0), text.length);
    const lineStart = text.lastIndexOf("\n", at - 1) + 1;
    const newline = text.indexOf("\n", at);
    const lineEnd = newline === -1 ? text.length : newline;
    const line = text.slice(0, lineStart).split("\n").length;

    const raw = text.slice(lineStart, lineEnd).replace(/\r$/, "");
    const trimmed = raw.trim();
    if (trimmed.length <= PREVIEW_MAX_CHARS) return { line, preview: trimmed };

    const width = PREVIEW_MAX_CHARS - 2;
    const column = at - lineStart;
    const lead = Math.max(0, Math.floor((width - keywordLength) / 2));
    const start = Math.min(Math.max(0, column - lead), raw.length - width);
    const end = start + width;
    const window = raw.slice(start, end).trim();
    return {
        line,
        preview: `${start > 0 ? "…" : ""}${window}${end < raw.length ? "…" : ""}`,
    };
}

/** Literal, case-insensitive pattern for a search keyword. */
export function keywordPattern(keyword: string): RegExp {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    return new RegExp(escaped, "iu");
}

export function searchFiles(
    ctx: InspectContext,
    params: { directory: string; keyword: string; recursive?: boolean }
): InspectResult<SearchMatch[]> {
    if (!params.keyword) return fail("InvalidArgument", "keyword must not be empty");

    const dir = resolveDirectory(ctx, params.directory);
    if (!dir.ok) return dir;

    const rootReal = realRoot(ctx);
    if (!rootReal.ok) return rootReal;

    const needle = keywordPattern(params.keyword);
    const maxBytes = ctx.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    const matches: SearchMatch[] = [];

    for (const rel of walk(dir.value, rootReal.value, params.recursive ?? false).sort(byPath)) {
        const abs = join(dir.value, rel);
        try {
            if (statSync(abs).size > maxBytes) continue;
        } catch {
            continue;
        }

        const text = readText(abs, rel);
        if (!text.ok) continue;

        // Matching on the original text keeps the offset valid even where
        // lower-casing would change the string's length (e.g. "İ").
        const match = needle.exec(text.value);
        if (!match) continue;

        matches.push({ path: rel, ...buildPreview(text.value, match.index, match[0].length) });
    }

    return ok(matches);
}
