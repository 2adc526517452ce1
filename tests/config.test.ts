import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";
import { DEFAULT_BASE_URL, DEFAULT_PORT, DEFAULT_TIMEOUT_MS, loadConfig, resolveCacheDir } from "../config";
import { CacheDirError } from "../errors";

describe("config", () => {
    let root: string;

    beforeEach(() => {
        root = mkdtempSync(path.join(os.tmpdir(), "prayer-config-"));
    });

    afterEach(() => {
        rmSync(root, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    describe("resolveCacheDir", () => {
        it("should create a diyanet directory under DIYANET_CACHE_HOME", () => {
            const dir = resolveCacheDir({ DIYANET_CACHE_HOME: root });

            expect(dir).toBe(path.join(root, "diyanet"));
            expect(existsSync(dir)).toBe(true);
        });

        it("should prefer DIYANET_CACHE_HOME over XDG_CACHE_HOME", () => {
            const xdg = path.join(root, "xdg");

            const dir = resolveCacheDir({ DIYANET_CACHE_HOME: root, XDG_CACHE_HOME: xdg });

            expect(dir).toBe(path.join(root, "diyanet"));
        });

        it("should fall back to XDG_CACHE_HOME", () => {
            expect(resolveCacheDir({ XDG_CACHE_HOME: root })).toBe(path.join(root, "diyanet"));
        });

        it("should raise CacheDirError when the root does not exist", () => {
            const missing = path.join(root, "does-not-exist");

            expect(() => resolveCacheDir({ DIYANET_CACHE_HOME: missing })).toThrow(CacheDirError);
        });
    });

    describe("loadConfig", () => {
        it("should apply defaults", () => {
            const config = loadConfig({ DIYANET_CACHE_HOME: root });

            expect(config).toEqual({
                baseUrl: DEFAULT_BASE_URL,
                cacheDir: path.join(root, "diyanet"),
                timeoutMs: DEFAULT_TIMEOUT_MS,
                port: DEFAULT_PORT,
            });
        });

        it("should read overrides from the environment", () => {
            const config = loadConfig({
                DIYANET_CACHE_HOME: root,
                DIYANET_BASE_URL: "https://prayer.test",
                DIYANET_TIMEOUT_MS: "5000",
                PORT: "9000",
            });

            expect(config.baseUrl).toBe("https://prayer.test");
            expect(config.timeoutMs).toBe(5000);
            expect(config.port).toBe(9000);
        });

        it("should warn and keep the default for an invalid timeout", () => {
            const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

            const config = loadConfig({ DIYANET_CACHE_HOME: root, DIYANET_TIMEOUT_MS: "-3" });

            expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
            expect(warn).toHaveBeenCalledTimes(1);
        });
    });
});
