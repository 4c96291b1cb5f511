import { linspace } from "../utils/shared";

export interface LeadBiasConfig {
    /** Multiplier for the first sentence */
    high?: number;
    /** Multiplier for the last sentence */
    low?: number;
}

const DEFAULT_CONFIG: Required<LeadBiasConfig> = {
    high: 1.6,
    low: 0.7,
};

/**
 * Lead-bias multipliers for an n-sentence document, falling linearly from high
 * at index 0 to low at index n - 1: high - (high - low) * i / (n - 1).
 * Inverted-pyramid news puts the substance first; use a flat curve
 * (high === low) to switch the bias off.
 */
export function leadBiasMultipliers(count: number, config: LeadBiasConfig = {}): number[] {
    const { high = DEFAULT_CONFIG.high, low = DEFAULT_CONFIG.low } = config;
    return linspace(high, low, count);
}
