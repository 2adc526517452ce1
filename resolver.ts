import { z } from "zod";
import { NotFoundError, ParseError } from "./errors";
import { CachingFetcher, PageFetcher, QueryParams } from "./fetcher";
import { extractOptions, extractPrayerTimes } from "./scraping";
import { PersistentCache } from "./scripts/db";
import { AppConfig } from "./config";
import { PRAYER_NAMES, parseTimeOfDay, sameName } from "./utils";

const HOME_ENDPOINT = "/tr-TR/home";
const REGION_LIST_ENDPOINT = "/tr-TR/home/GetRegList";
const COUNTRY_SELECT_IDENTIFIER = "country-select";

// Labels as they appear in the tpt-title divs of a region page
const PRAYER_LABELS: Record<PrayerName, string> = {
    fajr: "İmsak",
    sunrise: "Güneş",
    dhuhr: "Öğle",
    asr: "İkindi",
    maghrib: "Akşam",
    isha: "Yatsı",
};

// The endpoint has been seen returning ids both as numbers and as digit strings
const RemoteId = z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]);

const StateListResponse = z.object({
    StateList: z.array(
        z.object({
            SehirAdiEn: z.string(),
            SehirID: RemoteId,
        })
    ),
});

const RegionListResponse = z.object({
    StateRegionList: z.array(
        z.object({
            IlceAdiEn: z.string(),
            IlceID: RemoteId,
            IlceUrl: z.string(),
        })
    ),
});

/**
 * Where the country directory survives between runs
 */
export interface CountryStore {
    getCountries(): Country[];
    setCountries(countries: readonly Country[]): void;
}

function decodeJson<S extends z.ZodTypeAny>(body: string, schema: S, what: string): z.output<S> {
    let raw: unknown;
    try {
        raw = JSON.parse(body);
    } catch (error) {
        throw new ParseError(`${what} is not valid JSON`, { cause: error });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw new ParseError(`Unexpected ${what} shape${where}: ${issue?.message ?? "invalid"}`);
    }
    return result.data;
}

/**
 * Resolves typed names to the country / state / region records the remote
 * site expects, and reads a region's prayer times.
 */
export class GeographicResolver {
    private countries: readonly Country[] | null = null;

    constructor(
        private readonly fetcher: PageFetcher,
        private readonly store: CountryStore
    ) {}

    /**
     * Country directory in ascending idx order. Read from the store when it
     * has one, otherwise scraped from the home page and stored.
     */
    async listCountries(): Promise<readonly Country[]> {
        if (this.countries) {
            return this.countries;
        }

        let countries = this.store.getCountries();
        if (countries.length === 0) {
            const page = await this.fetcher.fetch(HOME_ENDPOINT);

            // Last write wins on duplicate labels
            const byName = new Map<string, Country>();
            for (const [name, idx] of extractOptions(page, COUNTRY_SELECT_IDENTIFIER)) {
                byName.set(name, Object.freeze({ name, idx }));
            }

            if (byName.size === 0) {
                throw new ParseError(`No countries found in the '${COUNTRY_SELECT_IDENTIFIER}' list of the home page`);
            }

            countries = [...byName.values()].sort((a, b) => a.idx - b.idx);
            this.store.setCountries(countries);
        }

        this.countries = Object.freeze(countries);
        return this.countries;
    }

    async findCountry(name: string): Promise<Country> {
        const countries = await this.listCountries();
        const country = countries.find((c) => sameName(c.name, name));
        if (!country) {
            throw new NotFoundError("country", name);
        }
        return country;
    }

    /**
     * States of `country` in the order the remote site lists them
     */
    async listStates(country: Country): Promise<State[]> {
        const params: QueryParams = { ChangeType: "country", CountryId: country.idx };
        const body = await this.fetcher.fetch(REGION_LIST_ENDPOINT, params);
        const data = decodeJson(body, StateListResponse, "state list");

        return data.StateList.map((state) =>
            Object.freeze({ name: state.SehirAdiEn, idx: state.SehirID, country })
        );
    }

    /**
     * Regions of `state` in the order the remote site lists them
     */
    async listRegions(state: State): Promise<Region[]> {
        const params: QueryParams = {
            ChangeType: "state",
            CountryId: state.country.idx,
            StateId: state.idx,
        };
        const body = await this.fetcher.fetch(REGION_LIST_ENDPOINT, params);
        const data = decodeJson(body, RegionListResponse, "region list");

        return data.StateRegionList.map((region) =>
            Object.freeze({
                name: region.IlceAdiEn,
                idx: region.IlceID,
                url: region.IlceUrl,
                country: state.country,
                state,
            })
        );
    }

    async findState(country: Country, name: string): Promise<State> {
        const states = await this.listStates(country);
        const state = states.find((s) => sameName(s.name, name));
        if (!state) {
            throw new NotFoundError("state", name);
        }
        return state;
    }

    async findRegion(state: State, name: string): Promise<Region> {
        const regions = await this.listRegions(state);
        const region = regions.find((r) => sameName(r.name, name));
        if (!region) {
            throw new NotFoundError("region", name);
        }
        return region;
    }

    async getPrayerTimes(region: Region): Promise<PrayerTimes> {
        const page = await this.fetcher.fetch(region.url);

        const found = new Map<string, string>();
        for (const [label, value] of extractPrayerTimes(page)) {
            found.set(label.normalize("NFC"), value);
        }

        const missing = PRAYER_NAMES.map((name) => PRAYER_LABELS[name]).filter((label) => !found.has(label));
        if (missing.length > 0) {
            throw new ParseError(
                `Incomplete prayer-time schedule for region '${region.name}': missing ${missing.join(", ")}`
            );
        }

        const timeFor = (name: PrayerName): TimeOfDay => {
            const label = PRAYER_LABELS[name];
            return parseTimeOfDay(found.get(label) ?? "", label);
        };

        return Object.freeze({
            fajr: timeFor("fajr"),
            sunrise: timeFor("sunrise"),
            dhuhr: timeFor("dhuhr"),
            asr: timeFor("asr"),
            maghrib: timeFor("maghrib"),
            isha: timeFor("isha"),
        });
    }

    /**
     * Resolve all three levels and read the region's prayer times
     */
    async lookup(countryName: string, stateName: string, regionName: string): Promise<LookupResult> {
        const country = await this.findCountry(countryName);
        const state = await this.findState(country, stateName);
        const region = await this.findRegion(state, regionName);
        const times = await this.getPrayerTimes(region);
        return { country, state, region, times };
    }
}

export interface ResolverHandle {
    resolver: GeographicResolver;
    cache: PersistentCache;
    close: () => void;
}

/**
 * Open the cache in `config.cacheDir` and wire a resolver on top of it.
 * Call `close` on exit so the cache is flushed.
 */
export function createResolver(config: AppConfig): ResolverHandle {
    const cache = PersistentCache.open(config.cacheDir);
    const fetcher = new CachingFetcher({
        baseUrl: config.baseUrl,
        cache,
        timeoutMs: config.timeoutMs,
    });

    return {
        resolver: new GeographicResolver(fetcher, cache),
        cache,
        close: () => cache.close(),
    };
}
