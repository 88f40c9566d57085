// backend/config/configParsers.ts
import type { ScoreCountStrategy } from "../repositories/score/score.types.js";

export function parseCountStrategy(raw: string): ScoreCountStrategy {
    if (raw === "aggregate" || raw === "scan") return raw;
    throw new Error(`LEADERBOARD_COUNT_STRATEGY must be "aggregate" or "scan", got "${raw}"`);
}

export function parsePositiveInteger(name: string, value: number): number {
    if (!Number.isSafeInteger(value) || value < 1) {
        throw new Error(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

export function parseOrigins(raw: string): string[] {
    return raw
        .split(",")
        .map((o) => o.trim())
        .filter(Boolean);
}
