// backend/repositories/score/score.memory.ts
import type { ScoreRecord, ScoreStore } from "./score.types.js";

export function compareScoreRecords(a: ScoreRecord, b: ScoreRecord): number {
    if (a.score !== b.score) return b.score - a.score;

    const at = a.created_at.getTime();
    const bt = b.created_at.getTime();
    if (at !== bt) return at - bt;

    if (a.id === b.id) return 0;
    return a.id < b.id ? -1 : 1;
}

export type MemoryScoreStore = ScoreStore & {
    upsert: (record: ScoreRecord) => void;
    setScore: (id: string, score: number) => void;
    size: () => number;
};

/** Process-local store, mainly for tests and local tooling. */
export function createMemoryScoreStore(seed: readonly ScoreRecord[] = []): MemoryScoreStore {
    const records = new Map<string, ScoreRecord>();

    function upsert(record: ScoreRecord) {
        records.set(record.id, { ...record });
    }

    function setScore(id: string, score: number) {
        const existing = records.get(id);
        if (!existing) throw new Error(`Unknown score record: ${id}`);
        records.set(id, { ...existing, score });
    }

    function sorted(): ScoreRecord[] {
        return [...records.values()].sort(compareScoreRecords);
    }

    async function fetchPage(offset: number, limit: number): Promise<ScoreRecord[]> {
        return sorted()
            .slice(offset, offset + limit)
            .map((r) => ({ ...r }));
    }

    async function fetchById(id: string): Promise<ScoreRecord | null> {
        const hit = records.get(id);
        return hit ? { ...hit } : null;
    }

    async function countDistinctScoresGreaterThan(score: number): Promise<number> {
        const higher = new Set<number>();
        for (const r of records.values()) {
            if (r.score > score) higher.add(r.score);
        }
        return higher.size;
    }

    seed.forEach(upsert);

    return {
        upsert,
        setScore,
        size: () => records.size,
        fetchPage,
        fetchById,
        countDistinctScoresGreaterThan,
    };
}
