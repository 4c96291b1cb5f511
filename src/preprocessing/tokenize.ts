import type { TermFrequencyMap } from "../types";
import { splitWords } from "../utils/shared";
import stopWordList from "./stop-words.json";

// Standard English stop words, excluded from the scoring vocabulary
export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

/**
 * Normalize text for scoring: lowercase, replace punctuation with spaces
 */
export function normalizeText(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, " ") // Remove non-alphanumeric (Unicode-aware)
        .replace(/\s+/g, " ")
        .trim();
}

/**
 * Tokenize text into scoring tokens
 * @param text - Input text
 * @param options - Tokenization options
 */
export function tokenize(
    text: string,
    options: {
        removeStopWords?: boolean;
        minLength?: number;
    } = {}
): string[] {
    const {
        removeStopWords = true,
        minLength = 2,
    } = options;

    const normalized = normalizeText(text);
    if (normalized.length === 0) return [];

    let tokens = normalized.split(" ").filter(t => t.length >= minLength);

    if (removeStopWords) {
        tokens = tokens.filter(t => !STOP_WORDS.has(t));
    }

    return tokens;
}

/**
 * Adjacent token pairs joined by a space ("white house")
 */
export function buildBigrams(tokens: string[]): string[] {
    const bigrams: string[] = [];
    for (let i = 0; i + 1 < tokens.length; i++) {
        bigrams.push(`${tokens[i]} ${tokens[i + 1]}`);
    }
    return bigrams;
}

/**
 * Scoring terms for a token stream: unigrams, plus bigrams when enabled
 */
export function buildTerms(tokens: string[], includeBigrams: boolean): string[] {
    return includeBigrams ? [...tokens, ...buildBigrams(tokens)] : [...tokens];
}

/**
 * Build a term frequency map from terms
 */
export function buildTermFrequencyMap(terms: string[]): TermFrequencyMap {
    const tf: TermFrequencyMap = new Map();
    for (const term of terms) {
        tf.set(term, (tf.get(term) ?? 0) + 1);
    }
    return tf;
}

/**
 * Distinct lower-cased whitespace words, punctuation kept
 * Used for redundancy checks, not for scoring
 */
export function buildWordSet(text: string): Set<string> {
    return new Set(splitWords(text.toLowerCase()));
}

/**
 * Calculate term overlap ratio (how much of A is already in B)
 * An empty A never overlaps
 */
export function termOverlapRatio(wordsA: ReadonlySet<string>, wordsB: ReadonlySet<string>): number {
    if (wordsA.size === 0) return 0;

    let overlap = 0;
    for (const word of wordsA) {
        if (wordsB.has(word)) {
            overlap++;
        }
    }

    return overlap / wordsA.size;
}
