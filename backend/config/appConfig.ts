// backend/config/appConfig.ts
import { env } from "./env.js";
import { parseCountStrategy, parseOrigins, parsePositiveInteger } from "./configParsers.js";

export const appConfig = Object.freeze({
    server: {
        port: env.PORT,
        environment: env.NODE_ENV,
        corsOrigins: parseOrigins(env.CORS_ORIGINS),
    },

    auth: {
        jwtSecret: env.JWT_SECRET,
        audience: env.JWT_AUDIENCE,
    },

    leaderboard: {
        countStrategy: parseCountStrategy(env.LEADERBOARD_COUNT_STRATEGY),
        scanLimit: parsePositiveInteger("LEADERBOARD_SCAN_LIMIT", env.LEADERBOARD_SCAN_LIMIT),
    },
});
