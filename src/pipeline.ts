import type { Sentence, SummaryDebugInfo, SummaryResult } from "./types";
import { resolveOptions, type ResolvedOptions, type SummarizeOptions } from "./options";
import { segmentText } from "./preprocessing/segment";
import { scoreDocument, rankSentences, type RankerConfig } from "./scoring/ranker";
import { selectSentences } from "./extraction/select";
import { assembleSummary, truncateWords } from "./output/summary";
import { countWords, normalizeWhitespace, truncateText } from "./utils/shared";
import Logger from "./utils/logger";

/**
 * Create a result for input that produced no sentences
 */
function createEmptyResult(sourceWordCount: number): SummaryResult {
    return {
        summary: "",
        truncated: false,
        outcome: "empty",
        sentenceCount: 0,
        selectedIndices: [],
        sourceWordCount,
        wordCount: 0,
    };
}

/**
 * Short sources are returned whole; the word ceiling still applies
 */
function createPassthroughResult(
    normalized: string,
    sentences: Sentence[],
    sourceWordCount: number,
    opts: ResolvedOptions
): SummaryResult {
    const trimmed = truncateWords(normalized, opts.maxWords);
    return {
        summary: trimmed.text,
        truncated: trimmed.truncated,
        outcome: "passthrough",
        sentenceCount: sentences.length,
        selectedIndices: sentences.map(s => s.index),
        sourceWordCount,
        wordCount: trimmed.wordCount,
    };
}

function toRankerConfig(opts: ResolvedOptions): RankerConfig {
    return {
        tfidf: {
            bigrams: opts.bigrams,
            minDocFrequency: opts.minDocFrequency,
            maxDocFrequencyRatio: opts.maxDocFrequencyRatio,
            normalization: opts.normalization,
        },
        leadBias: {
            high: opts.leadBiasHigh,
            low: opts.leadBiasLow,
        },
    };
}

/**
 * Run the full summarization pipeline:
 * segment -> (empty / short-source check) -> score -> select -> trim.
 *
 * Stateless; every call builds its own vocabulary. Options are validated
 * before the text is touched.
 * @throws SummarizerConfigError on invalid options
 */
export function summarizeWithDetails(text: string, options: SummarizeOptions = {}): SummaryResult {
    const opts = resolveOptions(options);
    const logger = Logger.getInstance();

    const normalized = normalizeWhitespace(text);
    const sourceWordCount = countWords(normalized);

    // Step 1: Segment into sentences
    const sentences = logger.time("1. Segment into sentences", () =>
        segmentText(normalized, { minChars: opts.sentenceMinChars })
    );

    if (sentences.length === 0) {
        logger.debug("No sentences above the length threshold", opts.debug);
        return createEmptyResult(sourceWordCount);
    }

    // Step 1a: Short sources need no extraction
    if (sourceWordCount <= opts.minWords) {
        logger.debug(`Source has ${sourceWordCount} words (<= ${opts.minWords}), returning it whole`, opts.debug);
        return createPassthroughResult(normalized, sentences, sourceWordCount, opts);
    }

    // Step 2: Score sentences
    const scoring = logger.time("2. Score sentences", () => scoreDocument(sentences, toRankerConfig(opts)));

    if (scoring.degenerateVocabulary) {
        logger.debug("Empty vocabulary, falling back to uniform base weights", opts.debug);
    }

    // Step 3: Select sentences
    const selectedIndices = logger.time("3. Select sentences", () =>
        selectSentences(sentences, scoring.scores, {
            minWords: opts.minWords,
            maxSentences: opts.maxSentences,
            redundancyThreshold: opts.redundancyThreshold,
        })
    );

    // Step 4: Assemble and trim
    const trimmed = logger.time("4. Assemble summary", () =>
        assembleSummary(sentences, selectedIndices, opts.maxWords)
    );

    const result: SummaryResult = {
        summary: trimmed.text,
        truncated: trimmed.truncated,
        outcome: "extracted",
        sentenceCount: sentences.length,
        selectedIndices,
        sourceWordCount,
        wordCount: trimmed.wordCount,
    };

    if (opts.debug) {
        const debugInfo: SummaryDebugInfo = {
            vocabularySize: scoring.vocabularySize,
            degenerateVocabulary: scoring.degenerateVocabulary,
            rankedSentences: rankSentences(sentences, scoring.scores),
        };
        for (const ranked of debugInfo.rankedSentences.slice(0, 10)) {
            logger.debug(`  #${ranked.index} ${ranked.score.toFixed(3)}: ${truncateText(ranked.text, 80)}`);
        }
        return { ...result, debug: debugInfo };
    }

    return result;
}

/**
 * Summarize text, returning only the summary string ("" when nothing could be extracted)
 * @throws SummarizerConfigError on invalid options
 */
export function summarize(text: string, options: SummarizeOptions = {}): string {
    return summarizeWithDetails(text, options).summary;
}
