#!/usr/bin/env node
/**
 * Prayer Times CLI
 *
 * Usage: npm run cli -- <country> <state> <region>
 *
 * With fewer arguments, lists the next level of the directory instead:
 * no arguments lists countries, a country lists its states, a country and
 * a state list that state's regions.
 */

import { loadConfig } from "../config";
import { createResolver, GeographicResolver } from "../resolver";
import { formatPrayerTimes } from "../utils";

async function run(resolver: GeographicResolver, args: string[]): Promise<void> {
    const [countryName, stateName, regionName] = args;

    if (countryName === undefined) {
        for (const country of await resolver.listCountries()) {
            console.log(`${country.name} (${country.idx})`);
        }
        return;
    }

    const country = await resolver.findCountry(countryName);
    if (stateName === undefined) {
        for (const state of await resolver.listStates(country)) {
            console.log(`${state.name} (${state.idx})`);
        }
        return;
    }

    const state = await resolver.findState(country, stateName);
    if (regionName === undefined) {
        for (const region of await resolver.listRegions(state)) {
            console.log(`${region.name} (${region.idx})`);
        }
        return;
    }

    const region = await resolver.findRegion(state, regionName);
    const times = await resolver.getPrayerTimes(region);
    for (const line of formatPrayerTimes(times)) {
        console.log(line);
    }
}

async function main(): Promise<void> {
    const { resolver, close } = createResolver(loadConfig());
    try {
        await run(resolver, process.argv.slice(2));
    } finally {
        close();
    }
}

main().catch((error) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
