import { describe, it, expect } from "vitest";
import {
    STOP_WORDS,
    buildBigrams,
    buildTermFrequencyMap,
    buildTerms,
    buildWordSet,
    normalizeText,
    termOverlapRatio,
    tokenize,
} from "../tokenize";

describe("normalizeText", () => {
    it("lowercases and replaces punctuation with spaces", () => {
        expect(normalizeText("Hello, World! It's 9:30.")).toBe("hello world it s 9 30");
    });

    it("keeps non-ASCII letters", () => {
        expect(normalizeText("Café in Zürich")).toBe("café in zürich");
    });
});

describe("tokenize", () => {
    it("drops stop words and keeps numbers", () => {
        expect(tokenize("The Senate passed the budget bill, 52-48, on Friday.")).toEqual([
            "senate", "passed", "budget", "bill", "52", "48", "friday",
        ]);
    });

    it("drops tokens shorter than the minimum length", () => {
        expect(tokenize("A b cd")).toEqual(["cd"]);
        expect(tokenize("A b cd", { minLength: 3 })).toEqual([]);
    });

    it("can keep stop words", () => {
        expect(tokenize("The budget", { removeStopWords: false })).toEqual(["the", "budget"]);
    });

    it("does not stem", () => {
        expect(tokenize("running runners ran")).toEqual(["running", "runners", "ran"]);
    });

    it("returns empty array for punctuation-only text", () => {
        expect(tokenize("... !!! ---")).toEqual([]);
    });

    it("loads the standard stop word list", () => {
        expect(STOP_WORDS.has("the")).toBe(true);
        expect(STOP_WORDS.has("because")).toBe(true);
        expect(STOP_WORDS.has("budget")).toBe(false);
    });
});

describe("buildBigrams / buildTerms", () => {
    it("pairs adjacent tokens", () => {
        expect(buildBigrams(["white", "house", "press"])).toEqual(["white house", "house press"]);
        expect(buildBigrams(["alone"])).toEqual([]);
    });

    it("appends bigrams only when enabled", () => {
        expect(buildTerms(["white", "house"], false)).toEqual(["white", "house"]);
        expect(buildTerms(["white", "house"], true)).toEqual(["white", "house", "white house"]);
    });
});

describe("buildTermFrequencyMap", () => {
    it("counts occurrences, including names of object prototype members", () => {
        const tf = buildTermFrequencyMap(["constructor", "budget", "constructor"]);

        expect(tf.get("constructor")).toBe(2);
        expect(tf.get("budget")).toBe(1);
        expect(tf.get("missing")).toBeUndefined();
    });
});

describe("buildWordSet", () => {
    it("lowercases whitespace words and keeps punctuation", () => {
        expect([...buildWordSet("The cat, the CAT.")].sort()).toEqual(["cat,", "cat.", "the"]);
    });

    it("is empty for blank text", () => {
        expect(buildWordSet("   ").size).toBe(0);
    });
});

describe("termOverlapRatio", () => {
    it("measures how much of the first set is in the second", () => {
        const a = new Set(["a", "b", "c", "d"]);
        const b = new Set(["a", "b", "x"]);

        expect(termOverlapRatio(a, b)).toBe(0.5);
        expect(termOverlapRatio(b, a)).toBeCloseTo(2 / 3);
    });

    it("returns 0 for an empty first set", () => {
        expect(termOverlapRatio(new Set(), new Set(["a"]))).toBe(0);
    });
});
