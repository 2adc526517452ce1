import { Parser } from "htmlparser2";
import { casefold } from "./utils";

/**
 * Receives markup events in document order. No tree is built.
 */
export interface MarkupHandler {
    onStartTag(tag: string, attributes: Record<string, string>): void;
    onText(text: string): void;
    onEndTag(tag: string): void;
}

/**
 * Feed `html` through htmlparser2 and forward its events to `handler`.
 *
 * Tag and attribute names are lower-cased, entities decoded, and consecutive
 * text chunks between two tags are joined into one text event. End tags that
 * htmlparser2 only implies (unclosed elements) are not forwarded.
 */
export function streamMarkup(html: string, handler: MarkupHandler): void {
    let pendingText = "";

    const flushText = () => {
        if (pendingText) {
            const text = pendingText;
            pendingText = "";
            handler.onText(text);
        }
    };

    const parser = new Parser(
        {
            onopentag: (name, attribs) => {
                flushText();
                handler.onStartTag(name, attribs);
            },
            ontext: (text) => {
                pendingText += text;
            },
            onclosetag: (name, isImplied) => {
                flushText();
                if (!isImplied) {
                    handler.onEndTag(name);
                }
            },
        },
        { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
    );

    parser.write(html);
    parser.end();
    flushText();
}

// ---------------------------------------------------------------------------
// <select> option lists
// ---------------------------------------------------------------------------

export type OptionRecord = [label: string, idx: number];

interface PendingOption {
    label: string | null;
    idx: number;
}

function parseOptionValue(value: string | undefined): number | null {
    if (value === undefined) return null;
    const trimmed = value.trim();
    return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Collects (label, idx) pairs from every <select> whose class contains `identifier`.
 *
 * Labels are case-folded. Options without a numeric value are skipped, and
 * options whose label never shows up are left out of `options`.
 */
export class OptionListParser implements MarkupHandler {
    private readonly collected: PendingOption[] = [];
    private current: PendingOption | null = null;
    private recording = false;
    private lastTag: string | null = null;

    constructor(private readonly identifier: string) {}

    onStartTag(tag: string, attributes: Record<string, string>): void {
        this.lastTag = tag;

        if (tag === "select") {
            // Selects do not nest, so a new one also ends an unclosed previous one
            this.recording = attributes.class !== undefined && attributes.class.includes(this.identifier);
            this.current = null;
        } else if (this.recording && tag === "option") {
            const idx = parseOptionValue(attributes.value);
            this.current = idx === null ? null : { label: null, idx };
            if (this.current) {
                this.collected.push(this.current);
            }
        }
    }

    onText(text: string): void {
        if (!this.recording || this.lastTag !== "option" || !this.current || this.current.label !== null) {
            return;
        }

        const label = text.trim();
        if (label) {
            this.current.label = casefold(label);
        }
    }

    onEndTag(tag: string): void {
        if (tag === "select" && this.recording) {
            this.recording = false;
            this.current = null;
        }
    }

    /**
     * Collected options in ascending idx order, whether or not the select was closed
     */
    get options(): OptionRecord[] {
        const sorted = [...this.collected].sort((a, b) => a.idx - b.idx);
        const options: OptionRecord[] = [];
        for (const option of sorted) {
            if (option.label !== null) {
                options.push([option.label, option.idx]);
            }
        }
        return options;
    }
}

export function extractOptions(html: string, identifier: string): OptionRecord[] {
    const parser = new OptionListParser(identifier);
    streamMarkup(html, parser);
    return parser.options;
}

// ---------------------------------------------------------------------------
// Prayer-time title/value divs
// ---------------------------------------------------------------------------

export type TimeRecord = [label: string, value: string];

type RecordState = "none" | "name" | "value";

interface PendingTime {
    label: string;
    value: string | null;
}

/**
 * Pairs up <div class="tpt-title"> labels with the <div class="tpt-time">
 * values that follow them.
 *
 * A value that arrives when the last label already has one throws that last
 * record away instead of overwriting it; so does a second label arriving
 * before the first got its value.
 */
export class PrayerTimeParser implements MarkupHandler {
    private readonly records: PendingTime[] = [];
    private state: RecordState = "none";

    onStartTag(tag: string, attributes: Record<string, string>): void {
        if (tag !== "div") return;

        if (attributes.class === "tpt-title") {
            this.state = "name";
        } else if (attributes.class === "tpt-time") {
            this.state = "value";
        }
    }

    onText(text: string): void {
        if (this.state === "none" || !text.trim()) return;

        const last = this.records.at(-1);
        if (this.state === "name" && (last === undefined || last.value !== null)) {
            this.records.push({ label: text.trim(), value: null });
        } else if (this.state === "value" && last !== undefined && last.value === null) {
            last.value = text;
        } else {
            this.records.pop();
        }
    }

    onEndTag(tag: string): void {
        if (tag === "div") {
            this.state = "none";
        }
    }

    get times(): TimeRecord[] {
        const times: TimeRecord[] = [];
        for (const record of this.records) {
            if (record.value !== null) {
                times.push([record.label, record.value]);
            }
        }
        return times;
    }
}

export function extractPrayerTimes(html: string): TimeRecord[] {
    const parser = new PrayerTimeParser();
    streamMarkup(html, parser);
    return parser.times;
}
