/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { summarizeTool } from "./tool";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

// Create MCP server
const server = new McpServer({
    name: "lede_mcp",
    version: "0.1.0",
});

// Register the summarize tool
server.tool(
    "lede_summarize",
    `Summarize a long text (typically a news article) by extracting its most representative sentences. Deterministic, no generative model: the output is made only of sentences from the input, in their original order, trimmed to a word budget.

WHEN TO USE:
- You have the full text of an article and need a short, faithful digest
- You need a summary you can quote verbatim from the source

INPUT:
- Plain text by default; set html to true to pass a whole HTML page
- Short texts (at most minWords words) are returned whole

RETURNS: The summary text, or a notice when no sentence could be extracted.`,
    {
        text: z.string().describe("The article text (or HTML page when html is true)"),
        html: z.boolean().optional().describe("Treat text as an HTML page and extract its article text first (default: false)"),
        preset: z.enum(["news", "general"]).optional().describe("news (default): strong lead bias and bigrams; general: gentle lead bias, single words"),
        minWords: z.number().optional().describe("Stop selecting once this many words are chosen (default: 100)"),
        maxWords: z.number().optional().describe("Hard word ceiling of the summary (default: 120)"),
        maxSentences: z.number().optional().describe("Most sentences to select (default: 10 for news, 6 for general)"),
        bigrams: z.boolean().optional().describe("Score adjacent word pairs as terms too"),
    },
    async ({ text, html, preset, minWords, maxWords, maxSentences, bigrams }) => {
        return summarizeTool({
            text,
            ...(html !== undefined && { html }),
            options: {
                ...(preset !== undefined && { preset }),
                ...(minWords !== undefined && { minWords }),
                ...(maxWords !== undefined && { maxWords }),
                ...(maxSentences !== undefined && { maxSentences }),
                ...(bigrams !== undefined && { bigrams }),
            },
        });
    }
);

// Start the server
async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.log("lede MCP server listening on stdio");
}

main().catch((error) => {
    logger.error(`Fatal error: ${error}`);
    process.exit(1);
});
