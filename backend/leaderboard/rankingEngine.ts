// backend/leaderboard/rankingEngine.ts
import type { ScoreStore } from "../repositories/score/score.types.js";
import { assignDensePositions, distinctScoresDesc, toRankedEntry } from "./denseRank.js";
import {
    fail,
    NotFoundError,
    ok,
    StoreError,
    type LeaderboardResult,
    ValidationError,
} from "./errors.js";
import type { LeaderboardPage, PageRequest, RankedEntry } from "./leaderboard.types.js";
import { validatePageRequest } from "./validation.js";

export type LeaderboardEngine = ReturnType<typeof createLeaderboardEngine>;

export function createLeaderboardEngine(store: ScoreStore) {
    if (!store) throw new Error("createLeaderboardEngine: missing store");

    // Store failures become results; nothing is retried here.
    async function fromStore<T>(what: string, run: () => Promise<T>): Promise<LeaderboardResult<T, StoreError>> {
        try {
            return ok(await run());
        } catch (e) {
            return fail(new StoreError(`Score store failed to ${what}`, { cause: e }));
        }
    }

    async function getLeaderboardPage(
        request: PageRequest
    ): Promise<LeaderboardResult<LeaderboardPage, ValidationError | StoreError>> {
        const valid = validatePageRequest(request);
        if (!valid.ok) return valid;

        const { page, pageSize } = valid.value;
        const offset = (page - 1) * pageSize;
        // No table is that long; an unsafe offset would not survive the trip to the store.
        if (offset > Number.MAX_SAFE_INTEGER) return ok({ items: [], page, pageSize });

        const fetched = await fromStore("fetch page", () => store.fetchPage(offset, pageSize));
        if (!fetched.ok) return fetched;

        const rows = fetched.value;
        if (!rows.length) return ok({ items: [], page, pageSize });

        const topScore = distinctScoresDesc(rows)[0] ?? 0;

        const higher = await fromStore("count higher scores", () =>
            store.countDistinctScoresGreaterThan(topScore)
        );
        if (!higher.ok) return higher;

        return ok({
            items: assignDensePositions(rows, higher.value + 1),
            page,
            pageSize,
        });
    }

    async function getUserRank(
        userId: string
    ): Promise<LeaderboardResult<RankedEntry, NotFoundError | StoreError>> {
        const fetched = await fromStore("fetch user", () => store.fetchById(userId));
        if (!fetched.ok) return fetched;

        const record = fetched.value;
        if (!record) return fail(new NotFoundError("User not found"));

        const higher = await fromStore("count higher scores", () =>
            store.countDistinctScoresGreaterThan(record.score)
        );
        if (!higher.ok) return higher;

        return ok(toRankedEntry(record, higher.value + 1));
    }

    return { getLeaderboardPage, getUserRank };
}
