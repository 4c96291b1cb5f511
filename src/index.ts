export { summarize, summarizeWithDetails } from "./pipeline";
export {
    resolveOptions,
    summarizeOptionsSchema,
    SummarizerConfigError,
    PRESETS,
    type Preset,
    type ResolvedOptions,
    type SummarizeOptions,
} from "./options";
export {
    resolveSummary,
    DEFAULT_PLACEHOLDER,
    type ArticleInput,
    type FallbackPolicy,
    type ResolvedSummary,
    type SummarySource,
} from "./fallback";
export { segmentText, splitIntoSentences } from "./preprocessing/segment";
export { htmlToText } from "./preprocessing/html";
export { buildTermVectors, type TfidfConfig, type TermVectorResult } from "./scoring/tfidf";
export { leadBiasMultipliers, type LeadBiasConfig } from "./scoring/position";
export { scoreSentences, scoreDocument, rankByScore, type RankerConfig } from "./scoring/ranker";
export { selectSentences, type SelectConfig } from "./extraction/select";
export { assembleSummary, truncateWords, ELLIPSIS } from "./output/summary";
export type {
    Sentence,
    TermVector,
    SummaryResult,
    SummaryOutcome,
    SummaryDebugInfo,
    RankedSentence,
} from "./types";
