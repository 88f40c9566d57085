import { Pool } from "pg";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createScoreRepository } from "./scoreRepository.js";

// No connection is opened: every query goes to the stub.
function stubPool(...results: Array<Array<Record<string, unknown>>>) {
    const pool = new Pool();
    const query = vi.spyOn(pool, "query");
    for (const rows of results) {
        query.mockImplementationOnce(async () => ({ rows }));
    }
    return { pool, query };
}

function squash(sql: unknown): string {
    return String(sql).replace(/\s+/g, " ").trim();
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe("createScoreRepository", () => {
    it("pages in score, created_at, id order", async () => {
        const { pool, query } = stubPool([
            { id: "a1", username: " alice ", avatar: "avatars/a1.png", score: 42, created_at: new Date("2024-02-01T00:00:00Z") },
            { id: "b2", username: "bob", avatar: null, score: "17", created_at: "2024-03-01T00:00:00Z" },
        ]);
        const repo = createScoreRepository(pool);

        const rows = await repo.fetchPage(20, 10);

        expect(squash(query.mock.calls[0]?.[0])).toBe(
            "select id, username, avatar, score, created_at from public.users order by score desc, created_at asc, id asc limit $1 offset $2"
        );
        expect(query.mock.calls[0]?.[1]).toEqual([10, 20]);
        expect(rows).toEqual([
            { id: "a1", username: "alice", avatar: "avatars/a1.png", score: 42, created_at: new Date("2024-02-01T00:00:00Z") },
            { id: "b2", username: "bob", avatar: null, score: 17, created_at: new Date("2024-03-01T00:00:00Z") },
        ]);
    });

    it("fetches one user by id", async () => {
        const created = new Date("2024-01-05T12:00:00Z");
        const { pool, query } = stubPool([{ id: "u1", username: "una", avatar: null, score: 7, created_at: created }]);
        const repo = createScoreRepository(pool);

        expect(await repo.fetchById("u1")).toEqual({ id: "u1", username: "una", avatar: null, score: 7, created_at: created });
        expect(query.mock.calls[0]?.[1]).toEqual(["u1"]);
    });

    it("returns null for a missing user", async () => {
        const { pool } = stubPool([]);
        const repo = createScoreRepository(pool);

        expect(await repo.fetchById("nope")).toBeNull();
    });

    it("skips the query for an empty id", async () => {
        const { pool, query } = stubPool();
        const repo = createScoreRepository(pool);

        expect(await repo.fetchById("")).toBeNull();
        expect(query).not.toHaveBeenCalled();
    });

    it("counts distinct higher scores with an aggregate by default", async () => {
        const { pool, query } = stubPool([{ count: 3 }]);
        const repo = createScoreRepository(pool);

        expect(await repo.countDistinctScoresGreaterThan(50)).toBe(3);
        expect(squash(query.mock.calls[0]?.[0])).toBe(
            "select count(distinct score)::int as count from public.users where score > $1"
        );
        expect(query.mock.calls[0]?.[1]).toEqual([50]);
    });

    it("reads a count returned as text", async () => {
        const { pool } = stubPool([{ count: "4" }]);
        const repo = createScoreRepository(pool);

        expect(await repo.countDistinctScoresGreaterThan(0)).toBe(4);
    });

    it("treats a missing count row as zero", async () => {
        const { pool } = stubPool([]);
        const repo = createScoreRepository(pool);

        expect(await repo.countDistinctScoresGreaterThan(0)).toBe(0);
    });

    it("dedupes scanned scores under the scan strategy", async () => {
        const { pool, query } = stubPool([{ score: 90 }, { score: 90 }, { score: 75 }, { score: "60" }, { score: 60 }]);
        const repo = createScoreRepository(pool, { strategy: "scan", scanLimit: 500 });

        expect(await repo.countDistinctScoresGreaterThan(10)).toBe(3);
        expect(query.mock.calls[0]?.[1]).toEqual([10, 500]);
    });

    it("warns when the scan reaches its limit", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const { pool } = stubPool([{ score: 9 }, { score: 8 }]);
        const repo = createScoreRepository(pool, { strategy: "scan", scanLimit: 2 });

        expect(await repo.countDistinctScoresGreaterThan(1)).toBe(2);
        expect(warn).toHaveBeenCalledWith("[scores] distinct-score scan hit its limit of 2 rows; rank may be low");
    });

    it("lets query errors reach the caller", async () => {
        const pool = new Pool();
        vi.spyOn(pool, "query").mockImplementationOnce(async () => {
            throw new Error("relation \"public.users\" does not exist");
        });
        const repo = createScoreRepository(pool);

        await expect(repo.fetchPage(0, 10)).rejects.toThrow("relation \"public.users\" does not exist");
    });
});
