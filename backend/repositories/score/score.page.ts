// backend/repositories/score/score.page.ts
import type { Pool } from "pg";
import type { ScoreRecord } from "./score.types.js";
import { SCORE_COLUMNS, toScoreRecord, type ScoreRow } from "./score.util.js";

export function createScorePageRepo(pool: Pool) {
    async function fetchPage(offset: number, limit: number): Promise<ScoreRecord[]> {
        const { rows } = await pool.query<ScoreRow>(
            `
        select ${SCORE_COLUMNS}
        from public.users
        order by score desc, created_at asc, id asc
        limit $1 offset $2
      `,
            [limit, offset]
        );

        return (rows ?? []).map(toScoreRecord);
    }

    return { fetchPage };
}
