import { describe, it, expect } from "vitest";
import {
    buildTermVectors,
    buildVocabulary,
    calculateIdf,
    computeDocumentStats,
    sumWeights,
} from "../tfidf";
import { createSentence } from "../../preprocessing/segment";

const IDF_2_OF_4 = Math.log(5 / 3) + 1;

function corpus(texts: string[]) {
    return texts.map((text, i) => createSentence(text, i));
}

describe("computeDocumentStats", () => {
    it("counts each term once per sentence", () => {
        const stats = computeDocumentStats([
            ["alpha", "alpha", "beta"],
            ["alpha", "gamma"],
        ]);

        expect(stats.totalDocs).toBe(2);
        expect(stats.docFrequency.get("alpha")).toBe(2);
        expect(stats.docFrequency.get("beta")).toBe(1);
        expect(stats.docFrequency.get("gamma")).toBe(1);
    });

    it("handles empty corpus", () => {
        const stats = computeDocumentStats([]);

        expect(stats.totalDocs).toBe(0);
        expect(stats.docFrequency.size).toBe(0);
    });
});

describe("calculateIdf", () => {
    it("uses smoothed log rarity", () => {
        expect(calculateIdf(2, 4)).toBeCloseTo(IDF_2_OF_4);
        expect(calculateIdf(4, 4)).toBeCloseTo(1);
    });

    it("gives rarer terms a higher weight", () => {
        expect(calculateIdf(1, 10)).toBeGreaterThan(calculateIdf(5, 10));
    });
});

describe("buildVocabulary", () => {
    const stats = computeDocumentStats([
        ["news", "alpha", "beta"],
        ["news", "alpha"],
        ["news", "gamma"],
        ["news", "beta"],
    ]);

    it("drops rare and near-universal terms", () => {
        expect(buildVocabulary(stats, 2, 0.9)).toEqual(["alpha", "beta"]);
    });

    it("keeps universal terms when the ratio allows them", () => {
        expect(buildVocabulary(stats, 2, 1)).toEqual(["alpha", "beta", "news"]);
    });

    it("keeps single-sentence terms when minDocFrequency is 1", () => {
        expect(buildVocabulary(stats, 1, 0.9)).toEqual(["alpha", "beta", "gamma"]);
    });
});

describe("buildTermVectors", () => {
    const sentences = corpus([
        "alpha beta gamma alpha",
        "alpha delta epsilon",
        "beta delta zeta",
        "omega theta iota",
    ]);

    it("weights each vocabulary term by tf * idf across the whole document", () => {
        const { vocabulary, vectors } = buildTermVectors(sentences);

        expect(vocabulary).toEqual(["alpha", "beta", "delta"]);
        expect(vectors).toHaveLength(4);
        expect(vectors[0]?.get("alpha")).toBeCloseTo(2 * IDF_2_OF_4);
        expect(vectors[0]?.get("beta")).toBeCloseTo(IDF_2_OF_4);
        expect(vectors[0]?.has("gamma")).toBe(false);
        expect(vectors[3]?.size).toBe(0);
    });

    it("sums a vector's weights", () => {
        const { vectors } = buildTermVectors(sentences);

        expect(sumWeights(vectors[0] ?? new Map())).toBeCloseTo(3 * IDF_2_OF_4);
        expect(sumWeights(new Map())).toBe(0);
    });

    it("divides by the euclidean norm in l2 mode", () => {
        const { vectors } = buildTermVectors(sentences, { normalization: "l2" });

        expect(vectors[1]?.get("alpha")).toBeCloseTo(1 / Math.SQRT2);
        expect(sumWeights(vectors[1] ?? new Map())).toBeCloseTo(Math.SQRT2);
        expect(vectors[3]?.size).toBe(0);
    });

    it("adds shared word pairs as terms in bigram mode", () => {
        const pairs = corpus([
            "white house aides",
            "white house staff",
            "unrelated words",
        ]);

        expect(buildTermVectors(pairs).vocabulary).toEqual(["house", "white"]);
        expect(buildTermVectors(pairs, { bigrams: true }).vocabulary).toEqual(["house", "white", "white house"]);
    });

    it("yields an empty vocabulary when no term repeats", () => {
        const { vocabulary, vectors } = buildTermVectors(corpus([
            "alpha beta",
            "gamma delta",
        ]));

        expect(vocabulary).toEqual([]);
        expect(vectors.map(v => v.size)).toEqual([0, 0]);
    });
});
