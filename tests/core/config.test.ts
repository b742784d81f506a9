/**
 * Configuration Validation Tests
 */

import { describe, it, expect } from "vitest";
import { parseProbability, parseRunConfig, ProbabilitySchema } from "../../src/core/config.ts";
import { InvalidArgumentError } from "../../src/core/errors.ts";

describe("parseProbability", () => {
    it("passes probabilities inside (0, 1) through", () => {
        expect(parseProbability(0.5)).toBe(0.5);
        expect(parseProbability(Number.MIN_VALUE)).toBe(Number.MIN_VALUE);
    });

    it.each([0, 1, -0.1, 1.2, Number.NaN, Infinity])("rejects %s", (q) => {
        expect(() => parseProbability(q)).toThrow(InvalidArgumentError);
    });

    it("names the violated bound", () => {
        expect(() => parseProbability(0)).toThrow("Invalid probability 0: probability must be greater than 0");
        expect(() => parseProbability(1)).toThrow("Invalid probability 1: probability must be less than 1");
    });

    it("is exposed as a schema", () => {
        expect(ProbabilitySchema.safeParse(0.9).success).toBe(true);
        expect(ProbabilitySchema.safeParse(1).success).toBe(false);
    });
});

describe("parseRunConfig", () => {
    it("fills in defaults", () => {
        expect(parseRunConfig()).toEqual({
            n: 200_000,
            seed: 7,
            outlierRate: 0.005,
            quantiles: [0.1, 0.5, 0.9],
        });
    });

    it("keeps explicit values", () => {
        expect(parseRunConfig({ n: 10, quantiles: [0.99] })).toEqual({
            n: 10,
            seed: 7,
            outlierRate: 0.005,
            quantiles: [0.99],
        });
    });

    it("names the rejected field", () => {
        expect(() => parseRunConfig({ outlierRate: 2 })).toThrow(/outlierRate/);
        expect(() => parseRunConfig({ quantiles: [0.5, 1] })).toThrow(/quantiles\.1/);
    });

    it("rejects an empty quantile set", () => {
        expect(() => parseRunConfig({ quantiles: [] })).toThrow(InvalidArgumentError);
    });

    it("rejects a non-positive sample count", () => {
        expect(() => parseRunConfig({ n: 0 })).toThrow(InvalidArgumentError);
    });
});
