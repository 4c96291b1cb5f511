#!/usr/bin/env node

import * as fs from "fs";
import { summarizeWithDetails } from "./pipeline";
import { SummarizerConfigError } from "./options";
import { htmlToText } from "./preprocessing/html";
import { formatSummary } from "./output/summary";
import { parseCliArgs, type CliArgs } from "./utils/args";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
lede - deterministic extractive summaries for news articles

Selects the most representative original sentences of a text (TF-IDF scoring
with lead bias, redundancy-aware selection) and trims them to a word budget.
No generative model is involved.

USAGE:
  lede [options] < article.txt
  lede --file article.txt [options]
  lede mcp                         Start the MCP server (stdio)

OPTIONS:
  --file, -f <path>      Read the text from a file instead of stdin
  --html                 Treat the input as an HTML page and extract its article text
  --preset <name>        news (default) or general
  --min-words <n>        Stop selecting once this many words are chosen (default: 100)
  --max-words <n>        Hard word ceiling of the summary (default: 120)
  --max-sentences <n>    Most sentences to select (default: preset)
  --bigrams              Score adjacent word pairs as terms too
  --no-bigrams           Score single words only
  --debug                Print the sentence ranking to stderr
  --timing, -t           Print a per-stage timing breakdown to stderr
  --help, -h             Show this help message

EXAMPLES:
  lede --file story.txt --max-words 80
  curl -s https://example.com/story | lede --html --preset general
`;

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString("utf8");
}

async function readInput(args: CliArgs): Promise<string | null> {
    if (args.filePath !== "") {
        if (!fs.existsSync(args.filePath)) {
            logger.error(`File not found: ${args.filePath}`);
            return null;
        }
        logger.log(`Reading file: ${args.filePath}`);
        return fs.readFileSync(args.filePath, "utf8");
    }

    if (process.stdin.isTTY) {
        console.log(HELP_TEXT);
        return null;
    }

    return readStdin();
}

async function runSummarize(args: CliArgs): Promise<number> {
    if (args.timing) {
        logger.setTimingEnabled(true);
    }

    const input = await logger.timeAsync("0. Read input", () => readInput(args));
    if (input === null) {
        return 1;
    }

    const text = args.html ? logger.time("0a. Extract HTML text", () => htmlToText(input)) : input;
    const result = summarizeWithDetails(text, args.options);

    if (args.timing) {
        logger.printTimings();
    }

    if (args.options.debug === true) {
        logger.debug("\n" + formatSummary(result));
    }

    if (result.summary.length === 0) {
        console.error("(no summary)");
        return 0;
    }

    console.log(result.summary);
    return 0;
}

async function main(): Promise<void> {
    let args: CliArgs;
    try {
        args = parseCliArgs(process.argv.slice(2));
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        console.error("Run 'lede --help' for usage.");
        process.exit(1);
    }

    switch (args.command) {
        case "help": {
            console.log(HELP_TEXT);
            break;
        }

        case "mcp": {
            // Dynamically import and run MCP server
            await import("./mcp/server");
            break;
        }

        case "summarize": {
            try {
                process.exitCode = await runSummarize(args);
            } catch (err) {
                if (err instanceof SummarizerConfigError) {
                    logger.error(err.message);
                    process.exit(1);
                }
                throw err;
            }
            break;
        }
    }
}

// Run main
main().catch(err => {
    logger.error(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    process.exit(1);
});
