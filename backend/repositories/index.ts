// backend/repositories/index.ts
import type { Pool } from "pg";
import type { ScoreCountOptions } from "./score/score.count.js";
import { createScoreRepository } from "./score/scoreRepository.js";

export type Repos = ReturnType<typeof createRepos>;

export function createRepos(pool: Pool, scoreOptions: ScoreCountOptions = {}) {
    if (!pool) throw new Error("createRepos: missing pool");

    return {
        scores: createScoreRepository(pool, scoreOptions),
    };
}
