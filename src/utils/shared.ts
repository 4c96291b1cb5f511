/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse runs (newlines, tabs) to a single space, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Split text into whitespace-delimited words
 */
export function splitWords(text: string): string[] {
    const normalized = normalizeWhitespace(text);
    if (normalized.length === 0) return [];
    return normalized.split(" ");
}

/**
 * Count whitespace-delimited words
 */
export function countWords(text: string): number {
    return splitWords(text).length;
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

// =============================================================================
// Sorting utilities
// =============================================================================

/**
 * Interface for items that can be sorted by score with index tie-breaking
 */
export interface Scoreable {
    score: number;
    index: number;
}

/**
 * Sort items by score descending with deterministic tie-break by index ascending
 * Returns a new sorted array (does not mutate input)
 */
export function sortByScoreDesc<T extends Scoreable>(items: T[]): T[] {
    return [...items].sort((a, b) => {
        const scoreDiff = b.score - a.score;
        if (scoreDiff !== 0) return scoreDiff;
        return a.index - b.index;
    });
}

// =============================================================================
// Math utilities
// =============================================================================

/**
 * Linearly spaced values from start to end (inclusive), count entries
 * A single entry gets start
 */
export function linspace(start: number, end: number, count: number): number[] {
    if (count <= 0) return [];
    if (count === 1) return [start];

    const values: number[] = [];
    for (let i = 0; i < count; i++) {
        values.push(start - (start - end) * (i / (count - 1)));
    }
    return values;
}
