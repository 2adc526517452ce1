import { format, getHours, getMinutes, isValid, parse } from "date-fns";
import { TimeFormatError } from "./errors";

// Any fixed day works; only the wall-clock part of a parsed time is kept
const REFERENCE_DATE = new Date(2000, 0, 1);

const TIME_PATTERN = /^\d{1,2}:\d{2}$/;

export const PRAYER_NAMES: readonly PrayerName[] = [
    "fajr",
    "sunrise",
    "dhuhr",
    "asr",
    "maghrib",
    "isha",
];

/**
 * Normalise a name for case-insensitive comparison: NFC, then lower-case.
 * This is plain lower-casing, not full Unicode case folding ("ß" stays "ß").
 * Example: "TURKEY" -> "turkey"
 */
export function casefold(str: string): string {
    return str.normalize("NFC").toLowerCase();
}

export function sameName(a: string, b: string): boolean {
    return casefold(a) === casefold(b);
}

/**
 * Parse a wall-clock "HH:MM" string into a time of day.
 * `label` only ends up in the error message.
 */
export function parseTimeOfDay(raw: string, label: string = "time"): TimeOfDay {
    const value = raw.trim();
    if (!TIME_PATTERN.test(value)) {
        throw new TimeFormatError(label, raw);
    }

    // "H" rejects hours above 23 and "mm" minutes above 59
    const parsed = parse(value, "H:mm", REFERENCE_DATE);
    if (!isValid(parsed)) {
        throw new TimeFormatError(label, raw);
    }

    return Object.freeze({ hour: getHours(parsed), minute: getMinutes(parsed) });
}

export function formatTimeOfDay(time: TimeOfDay): string {
    const date = new Date(
        REFERENCE_DATE.getFullYear(),
        REFERENCE_DATE.getMonth(),
        REFERENCE_DATE.getDate(),
        time.hour,
        time.minute
    );
    return format(date, "HH:mm");
}

export function titleCase(str: string): string {
    return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Plain "HH:mm" strings keyed by prayer name, in schedule order.
 */
export function serializePrayerTimes(times: PrayerTimes): Record<PrayerName, string> {
    return {
        fajr: formatTimeOfDay(times.fajr),
        sunrise: formatTimeOfDay(times.sunrise),
        dhuhr: formatTimeOfDay(times.dhuhr),
        asr: formatTimeOfDay(times.asr),
        maghrib: formatTimeOfDay(times.maghrib),
        isha: formatTimeOfDay(times.isha),
    };
}

/**
 * One "Fajr ===> 05:12" line per prayer.
 */
export function formatPrayerTimes(times: PrayerTimes): string[] {
    return PRAYER_NAMES.map((name) => `${titleCase(name)} ===> ${formatTimeOfDay(times[name])}`);
}
