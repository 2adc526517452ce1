type GeographicKind = "country" | "state" | "region";

interface GeographicUnit {
    readonly name: string;
    readonly idx: number;
}

type Country = GeographicUnit;

interface State extends GeographicUnit {
    readonly country: Country;
}

interface Region extends GeographicUnit {
    readonly url: string;
    readonly country: Country;
    readonly state: State;
}

interface TimeOfDay {
    readonly hour: number;
    readonly minute: number;
}

type PrayerName = "fajr" | "sunrise" | "dhuhr" | "asr" | "maghrib" | "isha";

interface PrayerTimes {
    readonly fajr: TimeOfDay;
    readonly sunrise: TimeOfDay;
    readonly dhuhr: TimeOfDay;
    readonly asr: TimeOfDay;
    readonly maghrib: TimeOfDay;
    readonly isha: TimeOfDay;
}

interface LookupResult {
    country: Country;
    state: State;
    region: Region;
    times: PrayerTimes;
}

interface PrayerTimesRequestBody {
    country?: string;
    state?: string;
    region?: string;
}
