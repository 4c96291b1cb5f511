import type { Sentence } from "../types";
import { buildWordSet, tokenize } from "./tokenize";
import { normalizeWhitespace, splitWords } from "../utils/shared";

export interface SegmentConfig {
    /** Fragments whose trimmed length (in code points) is not above this are dropped */
    minChars?: number;
}

const DEFAULT_CONFIG: Required<SegmentConfig> = {
    minChars: 40,
};

function isTerminal(char: string | undefined): boolean {
    return char === "." || char === "!" || char === "?";
}

/**
 * Split text into sentences on ".", "!" or "?" followed by whitespace
 * The punctuation stays with the preceding sentence
 */
export function splitIntoSentences(text: string): string[] {
    const normalized = normalizeWhitespace(text);
    if (normalized.length === 0) return [];

    const sentences: string[] = [];
    let start = 0;

    for (let i = 0; i < normalized.length; i++) {
        if (isTerminal(normalized[i]) && normalized[i + 1] === " ") {
            sentences.push(normalized.slice(start, i + 1));
            start = i + 2;
            i++; // Skip the space
        }
    }

    // Don't forget the last part
    if (start < normalized.length) {
        sentences.push(normalized.slice(start));
    }

    return sentences.map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * Build a sentence record; index is its position among kept sentences
 */
export function createSentence(text: string, index: number): Sentence {
    return {
        index,
        text,
        wordSet: buildWordSet(text),
        wordCount: splitWords(text).length,
        tokens: tokenize(text),
    };
}

/**
 * Segment raw text into a document: split, drop short fragments, index in source order
 */
export function segmentText(text: string, config: SegmentConfig = {}): Sentence[] {
    const { minChars = DEFAULT_CONFIG.minChars } = config;

    return splitIntoSentences(text)
        .filter(s => [...s].length > minChars)
        .map((s, index) => createSentence(s, index));
}
