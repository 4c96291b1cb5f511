import type { RankedSentence, Sentence } from "../types";
import { buildTermVectors, sumWeights, type TfidfConfig } from "./tfidf";
import { leadBiasMultipliers, type LeadBiasConfig } from "./position";
import { sortByScoreDesc } from "../utils/shared";

export interface RankerConfig {
    tfidf?: TfidfConfig;
    leadBias?: LeadBiasConfig;
}

export interface ScoringResult {
    /** Index-aligned with the input sentences */
    scores: number[];
    vocabularySize: number;
    /** True when no term survived vocabulary filtering and base weights fell back to 1 */
    degenerateVocabulary: boolean;
}

/** Base weight every sentence gets when the vocabulary is empty */
const NEUTRAL_BASE_WEIGHT = 1;

/**
 * Score every sentence of a document: summed TF-IDF weights times the lead-bias multiplier
 */
export function scoreDocument(sentences: Sentence[], config: RankerConfig = {}): ScoringResult {
    if (sentences.length === 0) {
        return { scores: [], vocabularySize: 0, degenerateVocabulary: false };
    }

    const { vocabulary, vectors } = buildTermVectors(sentences, config.tfidf);
    const degenerateVocabulary = vocabulary.length === 0;

    const baseScores = degenerateVocabulary
        ? sentences.map(() => NEUTRAL_BASE_WEIGHT)
        : vectors.map(sumWeights);

    const multipliers = leadBiasMultipliers(sentences.length, config.leadBias);
    const scores = baseScores.map((base, i) => base * (multipliers[i] ?? 1));

    return {
        scores,
        vocabularySize: vocabulary.length,
        degenerateVocabulary,
    };
}

/**
 * Score sentences, returning only the index-aligned score array
 */
export function scoreSentences(sentences: Sentence[], config: RankerConfig = {}): number[] {
    return scoreDocument(sentences, config).scores;
}

/**
 * Sentence indices by score descending; equal scores keep the lower index first
 */
export function rankByScore(scores: number[]): number[] {
    return sortByScoreDesc(scores.map((score, index) => ({ score, index }))).map(item => item.index);
}

/**
 * Ranked sentences with their scores, for debug output
 */
export function rankSentences(sentences: Sentence[], scores: number[]): RankedSentence[] {
    const ranked: RankedSentence[] = [];
    for (const index of rankByScore(scores)) {
        const sentence = sentences[index];
        const score = scores[index];
        if (sentence === undefined || score === undefined) continue;
        ranked.push({ index, score, text: sentence.text });
    }
    return ranked;
}
