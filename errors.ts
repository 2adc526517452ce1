/**
 * Error taxonomy shared by the fetcher, the extractors' callers and the resolver.
 *
 * Nothing in the core recovers from these: an operation either returns a
 * complete result or throws one of them. The CLI and the HTTP routes decide
 * how they surface.
 */

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Network or transport failure, a non-2xx status, or a body that could not be read.
 */
export class FetchError extends Error {
    readonly url: string;

    constructor(url: string, cause: unknown) {
        super(`Failed to fetch ${url}: ${describeCause(cause)}`, { cause });
        this.name = "FetchError";
        this.url = url;
    }
}

/**
 * No entry of the directory at `kind` level matches `unitName`.
 */
export class NotFoundError extends Error {
    readonly kind: GeographicKind;
    readonly unitName: string;

    constructor(kind: GeographicKind, unitName: string) {
        super(`Unknown/unsupported ${kind}: '${unitName}'`);
        this.name = "NotFoundError";
        this.kind = kind;
        this.unitName = unitName;
    }
}

/**
 * The markup or JSON did not have the expected shape.
 */
export class ParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ParseError";
    }
}

export class TimeFormatError extends Error {
    readonly label: string;
    readonly value: string;

    constructor(label: string, value: string) {
        super(`Invalid time for ${label}: '${value}' (expected HH:MM between 00:00 and 23:59)`);
        this.name = "TimeFormatError";
        this.label = label;
        this.value = value;
    }
}

/**
 * Raised before the core is reachable, when no cache root can be used.
 */
export class CacheDirError extends Error {
    readonly path: string;

    constructor(path: string, variables: readonly string[]) {
        super(
            `Cache root '${path}' does not exist. Either one of ${variables.join(", ")} ` +
                `should point to a valid path, or '~/.cache' should be available.`
        );
        this.name = "CacheDirError";
        this.path = path;
    }
}
