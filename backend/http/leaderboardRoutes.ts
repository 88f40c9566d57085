// backend/http/leaderboardRoutes.ts
import type { Application, Request, RequestHandler, Response } from "express";
import type { LeaderboardEngine } from "../leaderboard/rankingEngine.js";
import type { LeaderboardError } from "../leaderboard/errors.js";
import { parsePageQuery } from "../leaderboard/validation.js";

// Store diagnostics stay in the log; clients only see `genericMessage`.
function sendFailure(res: Response, route: string, error: LeaderboardError, genericMessage: string) {
    switch (error.kind) {
        case "validation":
            return res.status(400).json({ error: error.message });
        case "not_found":
            return res.status(404).json({ error: error.message });
        case "store":
            console.error(`${route} failed:`, error.cause ?? error);
            return res.status(500).json({ error: genericMessage });
    }
}

export function registerLeaderboardRoutes(
    app: Application,
    engine: LeaderboardEngine,
    requireAuth: RequestHandler
) {
    app.get("/api/leaderboard", async (req: Request, res: Response) => {
        const route = "GET /api/leaderboard";
        try {
            const request = parsePageQuery(req.query as Record<string, unknown>);
            if (!request.ok) return sendFailure(res, route, request.error, "Failed to load leaderboard");

            const result = await engine.getLeaderboardPage(request.value);
            if (!result.ok) return sendFailure(res, route, result.error, "Failed to load leaderboard");

            return res.json(result.value);
        } catch (e) {
            console.error(`${route} failed:`, e);
            return res.status(500).json({ error: "Failed to load leaderboard" });
        }
    });

    app.get("/api/leaderboard/my-rank", requireAuth, async (req: Request, res: Response) => {
        const route = "GET /api/leaderboard/my-rank";
        const userId = req.user?.sub;
        if (!userId) return res.status(401).json({ error: "Unauthorized" });

        try {
            const result = await engine.getUserRank(userId);
            if (!result.ok) return sendFailure(res, route, result.error, "Failed to load rank");

            return res.json(result.value);
        } catch (e) {
            console.error(`${route} failed:`, e);
            return res.status(500).json({ error: "Failed to load rank" });
        }
    });
}
