// backend/repositories/score/score.count.ts
import type { Pool } from "pg";
import type { ScoreCountStrategy } from "./score.types.js";
import { normalizeScore } from "./score.util.js";

export const DEFAULT_SCAN_LIMIT = 100_000;

export type ScoreCountOptions = {
    strategy?: ScoreCountStrategy;
    scanLimit?: number;
};

export function createScoreCountRepo(pool: Pool, options: ScoreCountOptions = {}) {
    const strategy = options.strategy ?? "aggregate";
    const scanLimit = options.scanLimit ?? DEFAULT_SCAN_LIMIT;

    async function countByAggregate(score: number): Promise<number> {
        const { rows } = await pool.query<{ count: number | string }>(
            `
        select count(distinct score)::int as count
        from public.users
        where score > $1
      `,
            [score]
        );

        return Number(rows?.[0]?.count ?? 0);
    }

    // Under-counts once more than scanLimit rows beat the score.
    async function countByScan(score: number): Promise<number> {
        const { rows } = await pool.query<{ score: number | string | null }>(
            `
        select score
        from public.users
        where score > $1
        order by score desc
        limit $2
      `,
            [score, scanLimit]
        );

        if ((rows?.length ?? 0) >= scanLimit) {
            console.warn(`[scores] distinct-score scan hit its limit of ${scanLimit} rows; rank may be low`);
        }

        return new Set((rows ?? []).map((r) => normalizeScore(r.score))).size;
    }

    async function countDistinctScoresGreaterThan(score: number): Promise<number> {
        return strategy === "scan" ? countByScan(score) : countByAggregate(score);
    }

    return { countDistinctScoresGreaterThan };
}
