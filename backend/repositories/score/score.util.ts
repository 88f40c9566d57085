// backend/repositories/score/score.util.ts
import type { ScoreRecord } from "./score.types.js";

export type ScoreRow = {
    id: string | number;
    username: string | null;
    avatar: string | null;
    score: number | string | null;
    created_at: Date | string;
};

export const SCORE_COLUMNS = "id, username, avatar, score, created_at";

export function normalizeScore(v: unknown): number {
    const n = Number(v ?? 0);
    return Number.isFinite(n) ? n : 0;
}

export function toScoreRecord(r: ScoreRow): ScoreRecord {
    return {
        id: String(r.id),
        username: String(r.username ?? "").trim(),
        avatar: r.avatar ?? null,
        score: normalizeScore(r.score),
        created_at: r.created_at instanceof Date ? r.created_at : new Date(r.created_at),
    };
}
