import type { Sentence } from "../types";
import { termOverlapRatio } from "../preprocessing/tokenize";
import { rankByScore } from "../scoring/ranker";

export interface SelectConfig {
    /** Stop once the selected sentences reach this many words */
    minWords?: number;
    /** Stop once this many sentences are selected */
    maxSentences?: number;
    /** Skip a candidate whose word overlap with the selection is above this */
    redundancyThreshold?: number;
}

export interface Selection {
    indices: number[];
    usedWords: Set<string>;
    wordCount: number;
}

const DEFAULT_CONFIG: Required<SelectConfig> = {
    minWords: 100,
    maxSentences: 10,
    redundancyThreshold: 0.6,
};

/**
 * Greedy redundancy-aware selection.
 *
 * Walks sentences by score (ties: lower index first), skips any candidate whose
 * word set overlaps the words already selected by more than the threshold, and
 * stops at minWords or maxSentences, whichever comes first. Earlier choices are
 * never revisited. Returns indices in document order.
 */
export function selectSentences(
    sentences: Sentence[],
    scores: number[],
    config: SelectConfig = {}
): number[] {
    const {
        minWords = DEFAULT_CONFIG.minWords,
        maxSentences = DEFAULT_CONFIG.maxSentences,
        redundancyThreshold = DEFAULT_CONFIG.redundancyThreshold,
    } = config;

    const selection: Selection = {
        indices: [],
        usedWords: new Set(),
        wordCount: 0,
    };

    for (const index of rankByScore(scores)) {
        if (selection.wordCount >= minWords || selection.indices.length >= maxSentences) {
            break;
        }

        const candidate = sentences[index];
        if (candidate === undefined) continue;

        if (termOverlapRatio(candidate.wordSet, selection.usedWords) > redundancyThreshold) {
            continue;
        }

        selection.indices.push(index);
        for (const word of candidate.wordSet) {
            selection.usedWords.add(word);
        }
        selection.wordCount += candidate.wordCount;
    }

    return [...selection.indices].sort((a, b) => a - b);
}
