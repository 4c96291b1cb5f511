import { describe, it, expect } from "vitest";
import { ELLIPSIS, assembleSummary, formatSummary, truncateWords } from "../summary";
import { createSentence } from "../../preprocessing/segment";
import type { SummaryResult } from "../../types";

describe("truncateWords", () => {
    it("cuts to exactly maxWords and glues the ellipsis to the last word", () => {
        expect(truncateWords("a b c d e", 3)).toEqual({
            text: "a b c…",
            truncated: true,
            wordCount: 3,
        });
    });

    it("leaves text within the budget untouched apart from whitespace", () => {
        expect(truncateWords("a  b\nc", 3)).toEqual({ text: "a b c", truncated: false, wordCount: 3 });
    });

    it("uses the single-character ellipsis", () => {
        expect(ELLIPSIS).toBe("…");
        expect(ELLIPSIS).toHaveLength(1);
    });
});

describe("assembleSummary", () => {
    const sentences = [
        createSentence("First sentence here.", 0),
        createSentence("Second sentence here.", 1),
        createSentence("Third sentence here.", 2),
    ];

    it("restores document order and joins with single spaces", () => {
        expect(assembleSummary(sentences, [2, 0], 100)).toEqual({
            text: "First sentence here. Third sentence here.",
            truncated: false,
            wordCount: 6,
        });
    });

    it("truncates at the word ceiling", () => {
        expect(assembleSummary(sentences, [0, 1], 4)).toEqual({
            text: "First sentence here. Second…",
            truncated: true,
            wordCount: 4,
        });
    });

    it("returns an empty string for an empty selection", () => {
        expect(assembleSummary(sentences, [], 100)).toEqual({ text: "", truncated: false, wordCount: 0 });
    });
});

describe("formatSummary", () => {
    it("prints the outcome, counts and summary", () => {
        const result: SummaryResult = {
            summary: "Only sentence.",
            truncated: true,
            outcome: "extracted",
            sentenceCount: 4,
            selectedIndices: [0, 2],
            sourceWordCount: 80,
            wordCount: 2,
        };

        expect(formatSummary(result)).toBe([
            "Outcome: extracted",
            "Source: 80 words, 4 sentences",
            "Selected: [0, 2]",
            "Summary: 2 words (truncated)",
            "",
            "Only sentence.",
        ].join("\n"));
    });
});
