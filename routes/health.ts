import { RequestHandler, Router } from "express";
import { PersistentCache } from "../scripts/db";

interface RemoteCheck {
    status: "healthy" | "unhealthy";
    responseTime: number;
    error?: string;
}

const checkRemoteConnectivity = async (baseUrl: string): Promise<RemoteCheck> => {
    const startTime = Date.now();

    try {
        const response = await fetch(baseUrl, {
            method: "HEAD",
            headers: {
                "User-Agent": "Mozilla/5.0",
            },
            signal: AbortSignal.timeout(10000),
        });

        const responseTime = Date.now() - startTime;

        if (response.ok) {
            return { status: "healthy", responseTime };
        }
        return {
            status: "unhealthy",
            responseTime,
            error: `HTTP ${response.status}: ${response.statusText}`,
        };
    } catch (error) {
        return {
            status: "unhealthy",
            responseTime: Date.now() - startTime,
            error: error instanceof Error ? error.message : "Unknown error",
        };
    }
};

export function createHealthHandler(baseUrl: string, cache: PersistentCache): RequestHandler {
    return async (req, res) => {
        try {
            const remote = await checkRemoteConnectivity(baseUrl);

            const healthStatus = {
                server: {
                    status: "healthy",
                    timestamp: new Date().toISOString(),
                    uptime: process.uptime(),
                },
                remote,
                cache: cache.stats(),
                overall: remote.status === "healthy" ? "healthy" : "degraded",
            };

            res.status(healthStatus.overall === "healthy" ? 200 : 503).json(healthStatus);
        } catch (error) {
            res.status(500).json({
                server: {
                    status: "unhealthy",
                    timestamp: new Date().toISOString(),
                    uptime: process.uptime(),
                },
                overall: "unhealthy",
                error: error instanceof Error ? error.message : "Unknown error",
            });
        }
    };
}

export default function createHealthRouter(baseUrl: string, cache: PersistentCache): Router {
    const router = Router();

    router.get("/health", createHealthHandler(baseUrl, cache));

    return router;
}
