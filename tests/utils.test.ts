import { describe, it, expect } from "vitest";
import { TimeFormatError } from "../errors";
import {
    casefold,
    formatPrayerTimes,
    formatTimeOfDay,
    parseTimeOfDay,
    sameName,
    serializePrayerTimes,
    titleCase,
} from "../utils";

const times: PrayerTimes = {
    fajr: { hour: 5, minute: 12 },
    sunrise: { hour: 6, minute: 41 },
    dhuhr: { hour: 13, minute: 5 },
    asr: { hour: 16, minute: 22 },
    maghrib: { hour: 19, minute: 18 },
    isha: { hour: 20, minute: 42 },
};

describe("utils", () => {
    describe("casefold", () => {
        it("should lower-case names", () => {
            expect(casefold("TURKEY")).toBe("turkey");
        });

        it("should compare names case-insensitively", () => {
            expect(sameName("Istanbul", "ISTANBUL")).toBe(true);
            expect(sameName("Istanbul", "Ankara")).toBe(false);
        });

        it("should only lower-case, without full case folding", () => {
            expect(casefold("STRAßE")).toBe("straße");
            expect(sameName("straße", "STRASSE")).toBe(false);
        });
    });

    describe("parseTimeOfDay", () => {
        it("should parse HH:MM", () => {
            expect(parseTimeOfDay("05:12")).toEqual({ hour: 5, minute: 12 });
        });

        it("should accept surrounding whitespace and a single-digit hour", () => {
            expect(parseTimeOfDay(" 5:07\n")).toEqual({ hour: 5, minute: 7 });
        });

        it("should accept the ends of the day", () => {
            expect(parseTimeOfDay("00:00")).toEqual({ hour: 0, minute: 0 });
            expect(parseTimeOfDay("23:59")).toEqual({ hour: 23, minute: 59 });
        });

        it("should reject hours above 23", () => {
            expect(() => parseTimeOfDay("24:00")).toThrow(TimeFormatError);
        });

        it("should reject minutes above 59", () => {
            expect(() => parseTimeOfDay("12:60")).toThrow(TimeFormatError);
        });

        it("should reject non-time text", () => {
            expect(() => parseTimeOfDay("soon", "İmsak")).toThrow("Invalid time for İmsak: 'soon'");
        });

        it("should carry the label and raw value on the error", () => {
            try {
                parseTimeOfDay("5.12", "Akşam");
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(TimeFormatError);
                expect((error as TimeFormatError).label).toBe("Akşam");
                expect((error as TimeFormatError).value).toBe("5.12");
            }
        });
    });

    describe("formatTimeOfDay", () => {
        it("should zero-pad hours and minutes", () => {
            expect(formatTimeOfDay({ hour: 5, minute: 7 })).toBe("05:07");
        });
    });

    describe("titleCase", () => {
        it("should capitalise the first letter", () => {
            expect(titleCase("maghrib")).toBe("Maghrib");
        });
    });

    describe("serializePrayerTimes", () => {
        it("should format every prayer as HH:mm", () => {
            expect(serializePrayerTimes(times)).toEqual({
                fajr: "05:12",
                sunrise: "06:41",
                dhuhr: "13:05",
                asr: "16:22",
                maghrib: "19:18",
                isha: "20:42",
            });
        });
    });

    describe("formatPrayerTimes", () => {
        it("should print one line per prayer in schedule order", () => {
            expect(formatPrayerTimes(times)).toEqual([
                "Fajr ===> 05:12",
                "Sunrise ===> 06:41",
                "Dhuhr ===> 13:05",
                "Asr ===> 16:22",
                "Maghrib ===> 19:18",
                "Isha ===> 20:42",
            ]);
        });
    });
});
