import type { Response } from "express";
import { FetchError, NotFoundError, ParseError, TimeFormatError } from "../errors";

/**
 * HTTP status for an error thrown while resolving a request
 */
export function errorStatus(error: unknown): number {
    if (error instanceof NotFoundError) return 404;
    // The remote site failed us or changed its markup
    if (error instanceof FetchError || error instanceof ParseError || error instanceof TimeFormatError) {
        return 502;
    }
    return 500;
}

export function sendError(res: Response, error: unknown, context: string): void {
    const status = errorStatus(error);
    const message = error instanceof Error ? error.message : String(error);

    if (status >= 500) {
        console.error(`[Server] ${context} failed:`, error);
    }

    res.status(status).json({ error: status === 500 ? `${context} failed.` : message });
}
