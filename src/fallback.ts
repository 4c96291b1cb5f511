import { summarize } from "./pipeline";
import type { SummarizeOptions } from "./options";
import { countWords } from "./utils/shared";
import Logger from "./utils/logger";

export const DEFAULT_PLACEHOLDER =
    "This article could not be summarized due to publisher restrictions. Please open the full article to read more.";

export type SummarySource = "generated" | "description" | "placeholder";

export interface ArticleInput {
    /** Full article text, when the host managed to retrieve it */
    articleText?: string | null;
    /** Provider-supplied (often clipped) article content */
    content?: string | null;
    /** Provider-supplied short description */
    description?: string | null;
}

export interface FallbackPolicy {
    /** Source texts shorter than this are not worth extracting from */
    minSourceWords?: number;
    placeholder?: string;
    summarizeOptions?: SummarizeOptions;
}

export interface ResolvedSummary {
    summary: string;
    source: SummarySource;
    isFallback: boolean;
}

const DEFAULT_POLICY: Required<FallbackPolicy> = {
    minSourceWords: 200,
    placeholder: DEFAULT_PLACEHOLDER,
    summarizeOptions: {
        minWords: 100,
        maxWords: 120,
    },
};

function nonEmpty(value: string | null | undefined): string | null {
    if (value === null || value === undefined) return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

/**
 * Host-side summary policy: extract from the article (or provider content) when
 * there is enough of it, otherwise fall back to the description, then to a
 * static placeholder. The core summarizer itself never produces placeholder text.
 */
export function resolveSummary(article: ArticleInput, policy: FallbackPolicy = {}): ResolvedSummary {
    const {
        minSourceWords = DEFAULT_POLICY.minSourceWords,
        placeholder = DEFAULT_POLICY.placeholder,
        summarizeOptions = DEFAULT_POLICY.summarizeOptions,
    } = policy;
    const logger = Logger.getInstance();

    const sourceText = nonEmpty(article.articleText) ?? nonEmpty(article.content);

    if (sourceText !== null) {
        const sourceWords = countWords(sourceText);
        if (sourceWords >= minSourceWords) {
            const summary = summarize(sourceText, summarizeOptions);
            if (summary.length > 0) {
                return { summary, source: "generated", isFallback: false };
            }
            logger.warn(`Extraction produced nothing from ${sourceWords} source words`);
        }
    }

    const description = nonEmpty(article.description);
    if (description !== null) {
        return { summary: description, source: "description", isFallback: true };
    }

    return { summary: placeholder, source: "placeholder", isFallback: true };
}
