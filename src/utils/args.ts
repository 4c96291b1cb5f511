import type { SummarizeOptions } from "../options";

export interface CliArgs {
    command: "summarize" | "mcp" | "help";
    filePath: string;
    html: boolean;
    timing: boolean;
    options: SummarizeOptions;
}

/**
 * Parse an integer flag value; malformed values become NaN and are rejected by option validation
 */
function parseIntArg(value: string): number {
    return /^-?\d+$/.test(value) ? parseInt(value, 10) : Number.NaN;
}

/**
 * Parse CLI arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliArgs {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");

    const parsed: CliArgs = {
        command: "summarize",
        filePath: "",
        html: false,
        timing: false,
        options: {},
    };

    if (args[0] === "mcp") {
        return { ...parsed, command: "mcp" };
    }
    if (args[0] === "help") {
        return { ...parsed, command: "help" };
    }

    const options: SummarizeOptions = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if ((arg === "--file" || arg === "-f") && nextArg !== undefined) {
            parsed.filePath = nextArg;
            i++;
        } else if (arg === "--preset" && nextArg !== undefined) {
            if (nextArg !== "news" && nextArg !== "general") {
                throw new Error(`Unknown preset: ${nextArg}`);
            }
            options.preset = nextArg;
            i++;
        } else if (arg === "--min-words" && nextArg !== undefined) {
            options.minWords = parseIntArg(nextArg);
            i++;
        } else if (arg === "--max-words" && nextArg !== undefined) {
            options.maxWords = parseIntArg(nextArg);
            i++;
        } else if (arg === "--max-sentences" && nextArg !== undefined) {
            options.maxSentences = parseIntArg(nextArg);
            i++;
        } else if (arg === "--bigrams") {
            options.bigrams = true;
        } else if (arg === "--no-bigrams") {
            options.bigrams = false;
        } else if (arg === "--html") {
            parsed.html = true;
        } else if (arg === "--debug") {
            options.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            parsed.timing = true;
        } else if (arg === "--help" || arg === "-h") {
            return { ...parsed, command: "help" };
        } else {
            throw new Error(`Unknown argument: ${arg}`);
        }
    }

    return { ...parsed, options };
}
