import { describe, it, expect } from "vitest";
import { buildSummaryPrompt, createLlmSummarizer } from "../src/summarizer.js";
import type { FileExcerpt } from "../src/tools/inspect.js";
import { scriptedProvider, textReply } from "./fakes.js";

const excerpt: FileExcerpt = {
    path: "notes/plan.md",
    content: "Ship the release on Friday.",
    truncated: false,
    totalChars: 27,
    maxChars: 10000,
};

describe("summarizer", () => {
    it("builds a prompt with path, size and content", () => {
        expect(buildSummaryPrompt(excerpt)).toBe(
            "Summarize the main content of the following file in 3-5 sentences.\n\n" +
            "File path: notes/plan.md\n" +
            "File size: 27 characters\n\n" +
            "Content:\nShip the release on Friday.\n"
        );
    });

    it("mentions truncation", () => {
        const prompt = buildSummaryPrompt({ ...excerpt, truncated: true, totalChars: 500, maxChars: 27 });
        expect(prompt.endsWith("\n(Note: the file is long; only the first 27 characters are shown.)")).toBe(true);
    });

    it("sends one tool-less completion and trims the reply", async () => {
        const provider = scriptedProvider([textReply("  A release plan.  ")]);
        const summarize = createLlmSummarizer(provider);

        expect(await summarize(excerpt)).toBe("A release plan.");
        expect(provider.calls).toEqual([[{ role: "user", content: buildSummaryPrompt(excerpt) }]]);
    });

    it("rejects an empty reply", async () => {
        const summarize = createLlmSummarizer(scriptedProvider([textReply("   ")]));
        await expect(summarize(excerpt)).rejects.toThrow("Scripted returned an empty summary");
    });
});
