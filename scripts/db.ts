import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import path from "path";
import { casefold } from "../utils";

export const CACHE_FILE_NAME = "cache.db";

interface PageRow {
    body: string;
}

interface CountryRow {
    name: string;
    idx: number;
}

export interface CacheStats {
    pages: number;
    countries: number;
}

/**
 * Persistent cache backing the fetcher and the country directory.
 *
 * Two sections, one table each:
 *   - page:      canonical request URL -> raw response body
 *   - countries: case-folded country name -> Country
 *
 * Entries never expire. The database is meant to be opened by one process at
 * a time; nothing coordinates writers from separate processes.
 */
export class PersistentCache {
    private readonly db: Database.Database;

    constructor(db: Database.Database) {
        this.db = db;
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS page (
                url             TEXT PRIMARY KEY,
                body            TEXT NOT NULL
            );

            CREATE TABLE IF NOT EXISTS countries (
                name            TEXT PRIMARY KEY,
                idx             INTEGER NOT NULL
            );

            CREATE INDEX IF NOT EXISTS idx_countries_idx ON countries(idx);
        `);
    }

    /**
     * Open (creating on first run) the cache database inside `cacheDir`
     */
    static open(cacheDir: string): PersistentCache {
        if (!existsSync(cacheDir)) {
            mkdirSync(cacheDir, { recursive: true });
        }

        const db = new Database(path.join(cacheDir, CACHE_FILE_NAME));
        db.pragma("journal_mode = WAL");
        return new PersistentCache(db);
    }

    static inMemory(): PersistentCache {
        return new PersistentCache(new Database(":memory:"));
    }

    getPage(url: string): string | undefined {
        const row = this.db.prepare(`SELECT body FROM page WHERE url = ?`).get(url) as
            | PageRow
            | undefined;
        return row?.body;
    }

    setPage(url: string, body: string): void {
        this.db.prepare(`INSERT OR REPLACE INTO page (url, body) VALUES (?, ?)`).run(url, body);
    }

    /**
     * Countries in ascending idx order
     */
    getCountries(): Country[] {
        const rows = this.db.prepare(`SELECT name, idx FROM countries ORDER BY idx ASC`).all() as CountryRow[];
        return rows.map((row) => Object.freeze({ name: row.name, idx: row.idx }));
    }

    /**
     * Store the country directory. A later entry with the same folded name
     * replaces an earlier one.
     */
    setCountries(countries: readonly Country[]): void {
        const insertCountry = this.db.prepare(`INSERT OR REPLACE INTO countries (name, idx) VALUES (?, ?)`);

        const insertMany = this.db.transaction((countries: readonly Country[]) => {
            for (const country of countries) {
                insertCountry.run(casefold(country.name), country.idx);
            }
        });
        insertMany(countries);
    }

    stats(): CacheStats {
        const pages = this.db.prepare(`SELECT COUNT(*) AS count FROM page`).get() as { count: number };
        const countries = this.db.prepare(`SELECT COUNT(*) AS count FROM countries`).get() as { count: number };
        return { pages: pages.count, countries: countries.count };
    }

    close(): void {
        this.db.close();
    }
}
