import { describe, it, expect } from "vitest";
import { leadBiasMultipliers } from "../position";

describe("leadBiasMultipliers", () => {
    it("falls linearly from high to low", () => {
        const multipliers = leadBiasMultipliers(5, { high: 1.6, low: 0.8 });

        expect(multipliers).toHaveLength(5);
        [1.6, 1.4, 1.2, 1.0, 0.8].forEach((expected, i) => {
            expect(multipliers[i]).toBeCloseTo(expected);
        });
    });

    it("defaults to 1.6 down to 0.7", () => {
        const multipliers = leadBiasMultipliers(3);

        expect(multipliers[0]).toBeCloseTo(1.6);
        expect(multipliers[1]).toBeCloseTo(1.15);
        expect(multipliers[2]).toBeCloseTo(0.7);
    });

    it("gives a single sentence the high value", () => {
        expect(leadBiasMultipliers(1, { high: 1.2, low: 0.8 })).toEqual([1.2]);
    });

    it("is flat when high equals low", () => {
        expect(leadBiasMultipliers(3, { high: 1, low: 1 })).toEqual([1, 1, 1]);
    });

    it("returns empty array for no sentences", () => {
        expect(leadBiasMultipliers(0)).toEqual([]);
    });
});
