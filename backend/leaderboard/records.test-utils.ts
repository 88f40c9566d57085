// backend/leaderboard/records.test-utils.ts
import type { ScoreRecord } from "../repositories/score/score.types.js";

const BASE_TIME = Date.UTC(2024, 0, 1);

/** Records registered one minute apart, in argument order. */
export function makeRecords(rows: Array<{ id: string; score: number; username?: string }>): ScoreRecord[] {
    return rows.map((r, idx) => ({
        id: r.id,
        username: r.username ?? `user${r.id}`,
        avatar: null,
        score: r.score,
        created_at: new Date(BASE_TIME + idx * 60_000),
    }));
}
