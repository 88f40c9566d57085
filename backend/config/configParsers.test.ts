import { describe, expect, it } from "vitest";
import { parseCountStrategy, parseOrigins, parsePositiveInteger } from "./configParsers.js";

describe("parsePositiveInteger", () => {
    it("passes a positive integer through", () => {
        expect(parsePositiveInteger("LEADERBOARD_SCAN_LIMIT", 100_000)).toBe(100_000);
    });

    it.each([0, -5, 1.5, Number.POSITIVE_INFINITY])("rejects %s", (value) => {
        expect(() => parsePositiveInteger("LEADERBOARD_SCAN_LIMIT", value)).toThrow(
            `LEADERBOARD_SCAN_LIMIT must be a positive integer, got ${value}`
        );
    });
});

describe("parseCountStrategy", () => {
    it("accepts the known strategies", () => {
        expect(parseCountStrategy("aggregate")).toBe("aggregate");
        expect(parseCountStrategy("scan")).toBe("scan");
    });

    it("rejects anything else", () => {
        expect(() => parseCountStrategy("exact")).toThrow('LEADERBOARD_COUNT_STRATEGY must be "aggregate" or "scan", got "exact"');
    });
});

describe("parseOrigins", () => {
    it("splits and trims a comma list", () => {
        expect(parseOrigins(" http://a.test ,http://b.test,, ")).toEqual(["http://a.test", "http://b.test"]);
    });
});
