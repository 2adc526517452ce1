import "dotenv/config"; // Load environment variables
import { existsSync, mkdirSync } from "fs";
import os from "os";
import path from "path";
import { CacheDirError } from "./errors";

export const DEFAULT_BASE_URL = "https://namazvakitleri.diyanet.gov.tr";
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_PORT = 8072;

// First variable that is set wins; "~/.cache" when neither is
export const CACHE_ROOT_VARIABLES = ["DIYANET_CACHE_HOME", "XDG_CACHE_HOME"] as const;
const CACHE_SUBDIRECTORY = "diyanet";

type Env = Record<string, string | undefined>;

export interface AppConfig {
    baseUrl: string;
    cacheDir: string;
    timeoutMs: number;
    port: number;
}

function expandHome(p: string): string {
    if (p === "~") return os.homedir();
    if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
    return p;
}

/**
 * Resolve (and create) the directory that holds the cache database.
 * The cache root itself must already exist; only the subdirectory is created.
 */
export function resolveCacheDir(env: Env = process.env): string {
    let root = "~/.cache";
    for (const variable of CACHE_ROOT_VARIABLES) {
        const value = env[variable];
        if (value) {
            root = value;
            break;
        }
    }

    const rootPath = path.resolve(expandHome(root));
    if (!existsSync(rootPath)) {
        throw new CacheDirError(rootPath, CACHE_ROOT_VARIABLES);
    }

    const cacheDir = path.join(rootPath, CACHE_SUBDIRECTORY);
    mkdirSync(cacheDir, { recursive: true });
    return cacheDir;
}

function readPositiveInt(env: Env, variable: string, fallback: number): number {
    const raw = env[variable];
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        console.warn(`${variable}="${raw}" is not a positive integer - using ${fallback}`);
        return fallback;
    }
    return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
    return {
        baseUrl: env.DIYANET_BASE_URL || DEFAULT_BASE_URL,
        cacheDir: resolveCacheDir(env),
        timeoutMs: readPositiveInt(env, "DIYANET_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
        port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    };
}
