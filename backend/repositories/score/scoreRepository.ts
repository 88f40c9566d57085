// backend/repositories/score/scoreRepository.ts
import type { Pool } from "pg";

import { createScoreCountRepo, type ScoreCountOptions } from "./score.count.js";
import { createScorePageRepo } from "./score.page.js";
import { createScoreReadRepo } from "./score.read.js";
import type { ScoreStore } from "./score.types.js";

export function createScoreRepository(pool: Pool, options: ScoreCountOptions = {}): ScoreStore {
  if (!pool) throw new Error("createScoreRepository: missing pool");

  return {
    ...createScorePageRepo(pool),
    ...createScoreReadRepo(pool),
    ...createScoreCountRepo(pool, options),
  };
}
