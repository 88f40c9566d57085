// backend/repositories/score/score.types.ts

export interface ScoreRecord {
  id: string;
  username: string;
  avatar: string | null;
  score: number;
  created_at: Date;
}

export type ScoreCountStrategy = "aggregate" | "scan";

/**
 * Read side of the score table. Pages come back ordered by
 * score desc, created_at asc, id asc.
 */
export interface ScoreStore {
  fetchPage: (offset: number, limit: number) => Promise<ScoreRecord[]>;
  fetchById: (id: string) => Promise<ScoreRecord | null>;
  countDistinctScoresGreaterThan: (score: number) => Promise<number>;
}
