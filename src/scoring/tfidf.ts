import type { DocumentStats, Sentence, TermFrequencyMap, TermVector } from "../types";
import { buildTermFrequencyMap, buildTerms } from "../preprocessing/tokenize";

export type VectorNormalization = "none" | "l2";

export interface TfidfConfig {
    /** Add adjacent word pairs as terms */
    bigrams?: boolean;
    /** Drop terms found in fewer sentences than this */
    minDocFrequency?: number;
    /** Drop terms found in more than this fraction of sentences */
    maxDocFrequencyRatio?: number;
    normalization?: VectorNormalization;
}

export interface TermVectorResult {
    vocabulary: string[];
    idf: Map<string, number>;
    vectors: TermVector[];
    stats: DocumentStats;
}

const DEFAULT_CONFIG: Required<TfidfConfig> = {
    bigrams: false,
    minDocFrequency: 2,
    maxDocFrequencyRatio: 0.9,
    normalization: "none",
};

/**
 * Count, for every term, how many sentences contain it
 */
export function computeDocumentStats(termLists: string[][]): DocumentStats {
    const docFrequency: TermFrequencyMap = new Map();

    for (const terms of termLists) {
        for (const term of new Set(terms)) {
            docFrequency.set(term, (docFrequency.get(term) ?? 0) + 1);
        }
    }

    return {
        totalDocs: termLists.length,
        docFrequency,
    };
}

/**
 * Smoothed inverse document frequency: ln((1 + N) / (1 + df)) + 1
 * Always >= 1, so a term in every sentence still counts once per occurrence
 */
export function calculateIdf(df: number, totalDocs: number): number {
    return Math.log((1 + totalDocs) / (1 + df)) + 1;
}

/**
 * Terms kept for weighting, sorted for deterministic iteration
 */
export function buildVocabulary(
    stats: DocumentStats,
    minDocFrequency: number,
    maxDocFrequencyRatio: number
): string[] {
    const maxDf = maxDocFrequencyRatio * stats.totalDocs;
    const vocabulary: string[] = [];

    for (const [term, df] of stats.docFrequency) {
        if (df >= minDocFrequency && df <= maxDf) {
            vocabulary.push(term);
        }
    }

    return vocabulary.sort();
}

function l2Normalize(vector: TermVector): TermVector {
    let sumSquares = 0;
    for (const weight of vector.values()) {
        sumSquares += weight * weight;
    }
    if (sumSquares === 0) return vector;

    const norm = Math.sqrt(sumSquares);
    const normalized: TermVector = new Map();
    for (const [term, weight] of vector) {
        normalized.set(term, weight / norm);
    }
    return normalized;
}

/**
 * Build corpus-relative term vectors for every sentence of a document in one pass.
 * Vocabulary and idf are local to this call.
 */
export function buildTermVectors(
    sentences: Sentence[],
    config: TfidfConfig = {}
): TermVectorResult {
    const {
        bigrams = DEFAULT_CONFIG.bigrams,
        minDocFrequency = DEFAULT_CONFIG.minDocFrequency,
        maxDocFrequencyRatio = DEFAULT_CONFIG.maxDocFrequencyRatio,
        normalization = DEFAULT_CONFIG.normalization,
    } = config;

    const termLists = sentences.map(s => buildTerms(s.tokens, bigrams));
    const stats = computeDocumentStats(termLists);
    const vocabulary = buildVocabulary(stats, minDocFrequency, maxDocFrequencyRatio);

    const idf = new Map<string, number>();
    for (const term of vocabulary) {
        idf.set(term, calculateIdf(stats.docFrequency.get(term) ?? 0, stats.totalDocs));
    }

    const vectors = termLists.map(terms => {
        const tf = buildTermFrequencyMap(terms);
        const vector: TermVector = new Map();

        for (const [term, count] of tf) {
            const termIdf = idf.get(term);
            if (termIdf === undefined) continue;
            vector.set(term, count * termIdf);
        }

        return normalization === "l2" ? l2Normalize(vector) : vector;
    });

    return { vocabulary, idf, vectors, stats };
}

/**
 * Sum of a term vector's weights
 */
export function sumWeights(vector: TermVector): number {
    let total = 0;
    for (const weight of vector.values()) {
        total += weight;
    }
    return total;
}
