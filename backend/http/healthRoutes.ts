// backend/http/healthRoutes.ts
import type { Application, Request, Response } from "express";

export const SERVICE_NAME = "Leaderboard API";
export const SERVICE_VERSION = "1.0.0";

export function registerHealthRoutes(app: Application, environment: string) {
    app.get("/", (_req: Request, res: Response) => {
        return res.json({ message: `${SERVICE_NAME} is running!`, version: SERVICE_VERSION });
    });

    app.get("/health", (_req: Request, res: Response) => {
        return res.json({ status: "healthy", environment });
    });
}
