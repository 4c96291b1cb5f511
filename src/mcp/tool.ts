import { summarize } from "../pipeline";
import { SummarizerConfigError, type SummarizeOptions } from "../options";
import { htmlToText } from "../preprocessing/html";

export const NO_SUMMARY_MESSAGE = "No summary could be extracted.";

export interface SummarizeToolInput {
    text: string;
    html?: boolean;
    options: SummarizeOptions;
}

export interface ToolTextResult {
    [key: string]: unknown;
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
}

/**
 * Handle a lede_summarize call; invalid options come back as an error result
 */
export function summarizeTool(input: SummarizeToolInput): ToolTextResult {
    const text = input.html === true ? htmlToText(input.text) : input.text;

    try {
        const summary = summarize(text, input.options);
        return {
            content: [{ type: "text", text: summary.length > 0 ? summary : NO_SUMMARY_MESSAGE }],
        };
    } catch (err) {
        if (err instanceof SummarizerConfigError) {
            return {
                content: [{ type: "text", text: err.message }],
                isError: true,
            };
        }
        throw err;
    }
}
