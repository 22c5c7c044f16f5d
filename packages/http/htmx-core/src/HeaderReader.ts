import { HtmxHeader } from '@hxwire/htmx-api';

/**
 * HeaderReader - Reads raw header values from an incoming request.
 *
 * Different implementations for different sources:
 * - MapHeaderReader: a header map, as built by the Express adapter or a test
 * - anything else that can answer a lookup by header (a fetch Headers object...)
 */
export interface HeaderReader {
    /**
     * Raw value of the header, or undefined if the request does not carry it.
     */
    read(header: HtmxHeader): string | undefined;
}

/**
 * Raw header values as Node.js exposes them on IncomingMessage.headers.
 */
export type RawHeaders = Record<string, string | string[] | undefined>;

/**
 * MapHeaderReader - HeaderReader over a map of header name -> values.
 *
 * Names are matched case-insensitively. When a header repeats, the first
 * value is used.
 */
export class MapHeaderReader implements HeaderReader {
    private readonly headers: Map<string, string[]>;

    constructor(headers: Map<string, string[]>) {
        this.headers = new Map();
        for (const [name, values] of headers) {
            const key = name.toLowerCase();
            const existing = this.headers.get(key);
            this.headers.set(key, existing ? [...existing, ...values] : [...values]);
        }
    }

    static fromRecord(headers: RawHeaders): MapHeaderReader {
        return new MapHeaderReader(toHeaderMap(headers));
    }

    read(header: HtmxHeader): string | undefined {
        const values = this.headers.get(header.getLookupName());
        if (!values || values.length === 0) {
            return undefined;
        }
        return values[0];
    }
}

/**
 * Normalise Node.js style headers into a map of lowercase name -> values.
 */
export function toHeaderMap(headers: RawHeaders): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const [name, value] of Object.entries(headers)) {
        if (value === undefined) {
            continue;
        }
        result.set(name.toLowerCase(), typeof value === 'string' ? [value] : [...value]);
    }
    return result;
}
