// backend/app.ts
import express, { type Application, type Request, type Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";

import type { JwtVerifier } from "./auth/jwt.js";
import { registerHealthRoutes } from "./http/healthRoutes.js";
import { registerLeaderboardRoutes } from "./http/leaderboardRoutes.js";
import { createRequireAuth } from "./http/requireAuth.js";
import { createLeaderboardEngine } from "./leaderboard/rankingEngine.js";
import type { ScoreStore } from "./repositories/score/score.types.js";

export type AppDeps = {
    scores: ScoreStore;
    verifyToken: JwtVerifier;
    corsOrigins: string[];
    environment: string;
};

export function createApp(deps: AppDeps): Application {
    const app = express();

    app.use(
        cors({
            origin: deps.corsOrigins,
            credentials: true,
            methods: ["GET", "OPTIONS"],
            allowedHeaders: ["Content-Type", "Authorization"],
        })
    );

    app.use(bodyParser.json());

    const engine = createLeaderboardEngine(deps.scores);

    registerHealthRoutes(app, deps.environment);
    registerLeaderboardRoutes(app, engine, createRequireAuth(deps.verifyToken));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: "Not found" });
    });

    return app;
}
