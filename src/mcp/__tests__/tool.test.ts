import { describe, it, expect } from "vitest";
import { NO_SUMMARY_MESSAGE, summarizeTool } from "../tool";

const ARTICLE = [
    "The city council approved the new transit budget after a long debate on Tuesday night.",
    "Mayor Elena Ruiz said the transit budget would add twelve electric buses next spring.",
    "Council members argued for hours about fares, routes and the cost of maintenance.",
    "Local business owners welcomed the plan but asked for more parking near the stations.",
    "The transit authority expects ridership to grow steadily once the buses arrive.",
    "Critics warned that the budget relies on state grants that have not been confirmed.",
    "Mayor Elena Ruiz said the transit budget would add twelve electric buses by spring.",
    "Mayor Elena Ruiz said that the transit budget would add twelve electric buses next spring.",
];

describe("summarizeTool", () => {
    it("returns the summary as a single text item", () => {
        const result = summarizeTool({
            text: ARTICLE.join(" "),
            options: { minWords: 60, maxSentences: 3 },
        });

        expect(result.isError).toBeUndefined();
        expect(result.content).toEqual([
            { type: "text", text: [ARTICLE[0], ARTICLE[1], ARTICLE[4]].join(" ") },
        ]);
    });

    it("extracts article text from HTML first when asked", () => {
        const html = `<html><body><nav><a href="/">Home</a></nav><article>${ARTICLE.map(s => `<p>${s}</p>`).join("")}</article></body></html>`;

        const result = summarizeTool({ text: html, html: true, options: { minWords: 60, maxSentences: 3 } });

        expect(result.content[0]?.text).toBe([ARTICLE[0], ARTICLE[1], ARTICLE[4]].join(" "));
    });

    it("returns a notice when nothing can be extracted", () => {
        const result = summarizeTool({ text: "Too short.", options: {} });

        expect(result.content).toEqual([{ type: "text", text: NO_SUMMARY_MESSAGE }]);
    });

    it("reports invalid options as an error result", () => {
        const result = summarizeTool({ text: ARTICLE.join(" "), options: { maxWords: 0 } });

        expect(result.isError).toBe(true);
        expect(result.content[0]?.text).toMatch(/^Invalid summarizer options: maxWords: /);
    });
});
