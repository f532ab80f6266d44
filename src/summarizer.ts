/**
 * summarizer.ts — Model-backed file summaries for the summarize_file tool
 *
 * A single completion with no tools. The file tools only prepare the bounded
 * excerpt; this is where it is turned into prose.
 */

import type { LLMProvider } from "./providers/types.js";
import type { FileExcerpt } from "./tools/inspect.js";
import type { Summarizer } from "./tools/files.js";

export function buildSummaryPrompt(excerpt: FileExcerpt): string {
    let prompt =
        `Summarize the main content of the following file in 3-5 sentences.\n\n` +
        `File path: ${excerpt.path}\n` +
        `File size: ${excerpt.totalChars} characters\n\n` +
        `Content:\n${excerpt.content}\n`;

    if (excerpt.truncated) {
        prompt += `\n(Note: the file is long; only the first ${excerpt.maxChars} characters are shown.)`;
    }
    return prompt;
}

export function createLlmSummarizer(provider: LLMProvider): Summarizer {
    return async (excerpt) => {
        const result = await provider.complete(
            [{ role: "user", content: buildSummaryPrompt(excerpt) }],
            []
        );
        const summary = result.content?.trim() ?? "";
        if (!summary) throw new Error(`${provider.name} returned an empty summary`);
        return summary;
    };
}
