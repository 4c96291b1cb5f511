import { z } from "zod";

export type Preset = "news" | "general";

export interface ResolvedOptions {
    preset: Preset;
    minWords: number;
    maxWords: number;
    maxSentences: number;
    redundancyThreshold: number;
    leadBiasHigh: number;
    leadBiasLow: number;
    sentenceMinChars: number;
    bigrams: boolean;
    minDocFrequency: number;
    maxDocFrequencyRatio: number;
    normalization: "none" | "l2";
    debug: boolean;
}

type PresetDefaults = Pick<
    ResolvedOptions,
    "sentenceMinChars" | "leadBiasHigh" | "leadBiasLow" | "bigrams" | "maxDocFrequencyRatio" | "maxSentences"
>;

/**
 * Lead-biased news articles: stricter fragment filter, steeper lead curve, bigrams on
 */
const NEWS_PRESET: PresetDefaults = {
    sentenceMinChars: 50,
    leadBiasHigh: 1.6,
    leadBiasLow: 0.7,
    bigrams: true,
    maxDocFrequencyRatio: 0.85,
    maxSentences: 10,
};

/**
 * General prose: looser fragment filter, gentle lead curve, unigrams only
 */
const GENERAL_PRESET: PresetDefaults = {
    sentenceMinChars: 40,
    leadBiasHigh: 1.2,
    leadBiasLow: 0.8,
    bigrams: false,
    maxDocFrequencyRatio: 0.9,
    maxSentences: 6,
};

export const PRESETS: Readonly<Record<Preset, PresetDefaults>> = {
    news: NEWS_PRESET,
    general: GENERAL_PRESET,
};

const SHARED_DEFAULTS = {
    minWords: 100,
    maxWords: 120,
    redundancyThreshold: 0.6,
    minDocFrequency: 2,
    normalization: "none",
    debug: false,
} as const;

export const summarizeOptionsSchema = z
    .object({
        preset: z.enum(["news", "general"]).optional(),
        minWords: z.number().int().min(1).optional(),
        maxWords: z.number().int().min(1).optional(),
        maxSentences: z.number().int().min(1).optional(),
        redundancyThreshold: z.number().min(0).max(1).optional(),
        leadBiasHigh: z.number().finite().min(0).optional(),
        leadBiasLow: z.number().finite().min(0).optional(),
        sentenceMinChars: z.number().int().min(0).optional(),
        bigrams: z.boolean().optional(),
        minDocFrequency: z.number().int().min(1).optional(),
        maxDocFrequencyRatio: z.number().gt(0).max(1).optional(),
        normalization: z.enum(["none", "l2"]).optional(),
        debug: z.boolean().optional(),
    })
    .strict();

export type SummarizeOptions = z.input<typeof summarizeOptionsSchema>;

/**
 * Invalid summarizer options, raised before any text is processed
 */
export class SummarizerConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid summarizer options: ${issues.join("; ")}`);
        this.name = "SummarizerConfigError";
    }
}

function formatIssue(issue: z.ZodIssue): string {
    const path = issue.path.join(".");
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate options and fill the rest from the preset and shared defaults
 * @throws SummarizerConfigError
 */
export function resolveOptions(options: unknown = {}): ResolvedOptions {
    const parsed = summarizeOptionsSchema.safeParse(options ?? {});
    if (!parsed.success) {
        throw new SummarizerConfigError(parsed.error.issues.map(formatIssue));
    }

    const explicit = parsed.data;
    const preset = explicit.preset ?? "news";
    const presetDefaults = PRESETS[preset];

    return {
        preset,
        minWords: explicit.minWords ?? SHARED_DEFAULTS.minWords,
        maxWords: explicit.maxWords ?? SHARED_DEFAULTS.maxWords,
        maxSentences: explicit.maxSentences ?? presetDefaults.maxSentences,
        redundancyThreshold: explicit.redundancyThreshold ?? SHARED_DEFAULTS.redundancyThreshold,
        leadBiasHigh: explicit.leadBiasHigh ?? presetDefaults.leadBiasHigh,
        leadBiasLow: explicit.leadBiasLow ?? presetDefaults.leadBiasLow,
        sentenceMinChars: explicit.sentenceMinChars ?? presetDefaults.sentenceMinChars,
        bigrams: explicit.bigrams ?? presetDefaults.bigrams,
        minDocFrequency: explicit.minDocFrequency ?? SHARED_DEFAULTS.minDocFrequency,
        maxDocFrequencyRatio: explicit.maxDocFrequencyRatio ?? presetDefaults.maxDocFrequencyRatio,
        normalization: explicit.normalization ?? SHARED_DEFAULTS.normalization,
        debug: explicit.debug ?? SHARED_DEFAULTS.debug,
    };
}
