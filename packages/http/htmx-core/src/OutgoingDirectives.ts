import { HtmxHeader } from '@hxwire/htmx-api';

/**
 * OutgoingDirectives - Single-valued htmx response headers queued for one
 * response. The last write for a header wins; insertion order is kept.
 */
export class OutgoingDirectives {
    private readonly values = new Map<HtmxHeader, string>();

    set(header: HtmxHeader, value: string): void {
        this.values.set(header, value);
    }

    get(header: HtmxHeader): string | undefined {
        return this.values.get(header);
    }

    has(header: HtmxHeader): boolean {
        return this.values.has(header);
    }

    delete(header: HtmxHeader): void {
        this.values.delete(header);
    }

    size(): number {
        return this.values.size;
    }

    /**
     * Header name -> value, ready to be written on a response.
     */
    toHeaderMap(): Map<string, string> {
        const result = new Map<string, string>();
        for (const [header, value] of this.values) {
            result.set(header.headerName, value);
        }
        return result;
    }
}
