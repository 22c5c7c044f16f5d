import { JsonValue, escapeNonAscii, toJsonValue } from './JsonValue';
import { SwapType } from './SwapType';

/**
 * The JSON body of an HX-Location header.
 * Keys are the ones the htmx client reads; absent options are left out.
 */
export interface HxLocationBody {
    path: string;
    target?: string;
    source?: string;
    event?: string;
    swap?: SwapType;
    headers?: Record<string, string>;
    values?: JsonValue;
    handler?: string;
    select?: string;
    push?: string | false;
    replace?: string;
}

/**
 * HxLocation - Builder for HX-Location header values.
 *
 * HX-Location makes htmx navigate without a full page reload, optionally
 * with a target selector, swap mode, extra request headers or values for the
 * follow-up request. Send it with `HtmxContext.redirectWithLocation()`.
 *
 * ```typescript
 * htmx.redirectWithLocation(
 *     new HxLocation('/todos')
 *         .target('#todos')
 *         .swap(SwapType.OuterHtml)
 *         .values({ page: 2 }),
 * );
 * ```
 *
 * A location with nothing but a path is sent as the bare path.
 */
export class HxLocation {
    private readonly path: string;
    private targetSelector?: string;
    private sourceSelector?: string;
    private eventName?: string;
    private swapType?: SwapType;
    private readonly requestHeaders = new Map<string, string>();
    private valuesJson?: JsonValue;
    private handlerName?: string;
    private selectSelector?: string;
    private pushValue?: string | false;
    private replacePath?: string;

    constructor(path: string) {
        this.path = path;
    }

    /** Element that receives the swap. */
    target(selector: string): this {
        this.targetSelector = selector;
        return this;
    }

    /** Element treated as the source of the request. */
    source(selector: string): this {
        this.sourceSelector = selector;
        return this;
    }

    /** Event that "triggered" the request. */
    event(event: string): this {
        this.eventName = event;
        return this;
    }

    swap(swapType: SwapType): this {
        this.swapType = swapType;
        return this;
    }

    /** Client-side callback that handles the response. */
    handler(handler: string): this {
        this.handlerName = handler;
        return this;
    }

    /** Part of the response that is swapped in. */
    select(selector: string): this {
        this.selectSelector = selector;
        return this;
    }

    /** Extra header sent with the follow-up request. */
    header(name: string, value: string): this {
        this.requestHeaders.set(name, value);
        return this;
    }

    /** Several extra headers at once, e.g. a Map or Object.entries(record). */
    headers(headers: Iterable<readonly [string, string]>): this {
        for (const [name, value] of headers) {
            this.requestHeaders.set(name, value);
        }
        return this;
    }

    /**
     * Values submitted with the follow-up request. Encoded immediately, so the
     * builder is left untouched when this throws.
     * @throws PayloadSerializationError
     */
    values(values: unknown): this {
        this.valuesJson = toJsonValue(values);
        return this;
    }

    /** Do not push a new history entry. */
    disablePush(): this {
        this.pushValue = false;
        return this;
    }

    /** Push this path into history instead of the request path. */
    pushPath(path: string): this {
        this.pushValue = path;
        return this;
    }

    /** Replace the current history entry with this path. */
    replace(path: string): this {
        this.replacePath = path;
        return this;
    }

    getPath(): string {
        return this.path;
    }

    /**
     * True when only the path is set.
     */
    isPathOnly(): boolean {
        return Object.keys(this.toBody()).length === 1;
    }

    toBody(): HxLocationBody {
        const body: HxLocationBody = { path: this.path };
        if (this.targetSelector !== undefined) body.target = this.targetSelector;
        if (this.sourceSelector !== undefined) body.source = this.sourceSelector;
        if (this.eventName !== undefined) body.event = this.eventName;
        if (this.swapType !== undefined) body.swap = this.swapType;
        if (this.requestHeaders.size > 0) {
            // sorted by name
            const names = [...this.requestHeaders.keys()].sort();
            const headers: Record<string, string> = {};
            for (const name of names) {
                headers[name] = this.requestHeaders.get(name) ?? '';
            }
            body.headers = headers;
        }
        if (this.valuesJson !== undefined) body.values = this.valuesJson;
        if (this.handlerName !== undefined) body.handler = this.handlerName;
        if (this.selectSelector !== undefined) body.select = this.selectSelector;
        if (this.pushValue !== undefined) body.push = this.pushValue;
        if (this.replacePath !== undefined) body.replace = this.replacePath;
        return body;
    }

    /**
     * The HX-Location wire value: the bare path, or the JSON body with
     * non-ASCII characters escaped.
     */
    toHeaderValue(): string {
        if (this.isPathOnly()) {
            return this.path;
        }
        return escapeNonAscii(JSON.stringify(this.toBody()));
    }
}
