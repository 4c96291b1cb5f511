import type { Sentence, SummaryResult } from "../types";
import { splitWords } from "../utils/shared";

export const ELLIPSIS = "…";

export interface TrimmedText {
    text: string;
    truncated: boolean;
    wordCount: number;
}

/**
 * Keep at most maxWords whitespace words; a cut text gets "…" glued to its last word
 */
export function truncateWords(text: string, maxWords: number): TrimmedText {
    const words = splitWords(text);

    if (words.length <= maxWords) {
        return { text: words.join(" "), truncated: false, wordCount: words.length };
    }

    return {
        text: words.slice(0, maxWords).join(" ") + ELLIPSIS,
        truncated: true,
        wordCount: maxWords,
    };
}

/**
 * Join the selected sentences in document order and apply the word ceiling
 * An empty selection gives an empty string
 */
export function assembleSummary(
    sentences: Sentence[],
    indices: number[],
    maxWords: number
): TrimmedText {
    const texts: string[] = [];
    for (const index of [...indices].sort((a, b) => a - b)) {
        const sentence = sentences[index];
        if (sentence !== undefined) {
            texts.push(sentence.text);
        }
    }

    if (texts.length === 0) {
        return { text: "", truncated: false, wordCount: 0 };
    }

    return truncateWords(texts.join(" "), maxWords);
}

/**
 * Format a summary result for display
 */
export function formatSummary(result: SummaryResult): string {
    const lines: string[] = [];

    lines.push(`Outcome: ${result.outcome}`);
    lines.push(`Source: ${result.sourceWordCount} words, ${result.sentenceCount} sentences`);
    lines.push(`Selected: [${result.selectedIndices.join(", ")}]`);
    lines.push(`Summary: ${result.wordCount} words${result.truncated ? " (truncated)" : ""}`);
    lines.push("");
    lines.push(result.summary);

    return lines.join("\n");
}
