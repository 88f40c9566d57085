// backend/config/env.ts
import "dotenv/config";

function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

function optionalEnv(name: string, fallback: string): string {
    return process.env[name] ?? fallback;
}

function optionalNumber(name: string, fallback: number): number {
    const v = process.env[name];
    if (!v) return fallback;
    const n = Number(v);
    if (!Number.isFinite(n)) {
        throw new Error(`Environment variable ${name} must be a number`);
    }
    return n;
}

export const env = Object.freeze({

    DATABASE_URL: requireEnv("DATABASE_URL"),
    JWT_SECRET: requireEnv("JWT_SECRET"),

    NODE_ENV: optionalEnv("NODE_ENV", "development"),
    JWT_AUDIENCE: optionalEnv("JWT_AUDIENCE", "authenticated"),
    CORS_ORIGINS: optionalEnv(
        "CORS_ORIGINS",
        "http://localhost:3000,http://127.0.0.1:3000,http://localhost:3001"
    ),
    LEADERBOARD_COUNT_STRATEGY: optionalEnv("LEADERBOARD_COUNT_STRATEGY", "aggregate"),
    LEADERBOARD_SCAN_LIMIT: optionalNumber("LEADERBOARD_SCAN_LIMIT", 100_000),
    DB_QUERY_TIMEOUT_MS: optionalNumber("DB_QUERY_TIMEOUT_MS", 5_000),
    PORT: optionalNumber("PORT", 8000),
});
