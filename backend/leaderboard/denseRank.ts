// backend/leaderboard/denseRank.ts
import type { ScoreRecord } from "../repositories/score/score.types.js";
import type { RankedEntry } from "./leaderboard.types.js";

export function toRankedEntry(record: ScoreRecord, position: number): RankedEntry {
    return {
        id: record.id,
        username: record.username,
        avatar: record.avatar,
        score: record.score,
        position,
    };
}

/** Distinct scores of a page, best first. */
export function distinctScoresDesc(rows: readonly ScoreRecord[]): number[] {
    return [...new Set(rows.map((r) => r.score))].sort((a, b) => b - a);
}

/**
 * Dense positions for a contiguous slice of the leaderboard.
 * `baseRank` is the position of the slice's best score; every further
 * distinct score on the slice adds exactly one.
 */
export function assignDensePositions(rows: readonly ScoreRecord[], baseRank: number): RankedEntry[] {
    const scoreToOffset = new Map<number, number>();
    distinctScoresDesc(rows).forEach((score, idx) => scoreToOffset.set(score, idx));

    return rows.map((r) => toRankedEntry(r, baseRank + (scoreToOffset.get(r.score) ?? 0)));
}
