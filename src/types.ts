export interface Sentence {
    index: number; // 0-based position among kept sentences
    text: string;
    wordSet: ReadonlySet<string>; // lower-cased whitespace words, overlap checks only
    wordCount: number;
    tokens: string[]; // scoring tokens (stop words removed)
}

export type TermFrequencyMap = Map<string, number>;

/** term -> tf * idf for one sentence */
export type TermVector = Map<string, number>;

export interface DocumentStats {
    totalDocs: number;
    docFrequency: TermFrequencyMap; // How many sentences contain each term
}

export type SummaryOutcome = "empty" | "passthrough" | "extracted";

export interface RankedSentence {
    index: number;
    score: number;
    text: string;
}

export interface SummaryDebugInfo {
    vocabularySize: number;
    degenerateVocabulary: boolean;
    rankedSentences: RankedSentence[];
}

export interface SummaryResult {
    summary: string;
    truncated: boolean;
    outcome: SummaryOutcome;
    sentenceCount: number;
    selectedIndices: number[];
    sourceWordCount: number;
    wordCount: number;
    debug?: SummaryDebugInfo;
}
