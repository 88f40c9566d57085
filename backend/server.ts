// backend/server.ts
import { createServer } from "node:http";

import { createApp } from "./app.js";
import { createJwtVerifier } from "./auth/jwt.js";
import { appConfig } from "./config/appConfig.js";
import { pool, verifyDatabaseConnection } from "./config/pg.js";
import { createRepos } from "./repositories/index.js";

const repos = createRepos(pool, {
    strategy: appConfig.leaderboard.countStrategy,
    scanLimit: appConfig.leaderboard.scanLimit,
});

const app = createApp({
    scores: repos.scores,
    verifyToken: createJwtVerifier({
        secret: appConfig.auth.jwtSecret,
        audience: appConfig.auth.audience,
    }),
    corsOrigins: appConfig.server.corsOrigins,
    environment: appConfig.server.environment,
});

const server = createServer(app);

async function bootstrap() {
    await verifyDatabaseConnection();

    server.listen(appConfig.server.port, () => {
        console.log(`HTTP listening on :${appConfig.server.port}`);
    });
}

function shutdown(signal: string) {
    console.log(`[shutdown] ${signal} received, closing`);
    server.close(() => {
        pool.end().then(
            () => process.exit(0),
            (err: unknown) => {
                console.error("[shutdown] Failed to close database pool:", err);
                process.exit(1);
            }
        );
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

bootstrap().catch((err) => {
    console.error("[bootstrap] Server bootstrap failed:", err);
    process.exit(1);
});
