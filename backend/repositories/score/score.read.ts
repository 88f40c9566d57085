// backend/repositories/score/score.read.ts
import type { Pool } from "pg";
import type { ScoreRecord } from "./score.types.js";
import { SCORE_COLUMNS, toScoreRecord, type ScoreRow } from "./score.util.js";

export function createScoreReadRepo(pool: Pool) {
    async function fetchById(userId: string | null | undefined): Promise<ScoreRecord | null> {
        if (!userId) return null;

        const { rows } = await pool.query<ScoreRow>(
            `
        select ${SCORE_COLUMNS}
        from public.users
        where id = $1
        limit 1
      `,
            [userId]
        );

        const row = rows?.[0];
        return row ? toScoreRecord(row) : null;
    }

    return { fetchById };
}
