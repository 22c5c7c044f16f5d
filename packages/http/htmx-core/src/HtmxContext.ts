import {
    HxLocation,
    HtmxResponseHeaders,
    SwapType,
    TRIGGER_STAGES,
    TRUE_TOKEN,
    TriggerPayload,
    TriggerStage,
    headerForStage,
} from '@hxwire/htmx-api';
import { HeaderReader, MapHeaderReader } from './HeaderReader';
import { OutgoingDirectives } from './OutgoingDirectives';
import { RequestSnapshot } from './RequestSnapshot';
import { TriggerEntry, TriggerRegistry } from './TriggerRegistry';

/**
 * HtmxContext - The htmx side of one request/response exchange.
 *
 * Built once per request from its headers, handed to the handler, and
 * flushed once after the handler returns:
 *
 * ```typescript
 * const htmx = HtmxContext.fromHeaders(requestHeaders);
 *
 * // handler
 * if (htmx.isHtmx) {
 *     htmx.retarget('#todos');
 *     htmx.triggerEvent('todo-added', TriggerPayload.json({ id: 7 }));
 * }
 *
 * // after the handler
 * for (const [name, value] of htmx.flush()) {
 *     response.setHeader(name, value);
 * }
 * ```
 *
 * An instance belongs to exactly one request and is never shared. flush() is
 * meant to be called exactly once; that is not checked.
 */
export class HtmxContext {
    readonly snapshot: RequestSnapshot;
    readonly isHtmx: boolean;
    readonly boosted: boolean;
    readonly historyRestoreRequest: boolean;

    private readonly directives = new OutgoingDirectives();
    private readonly triggers = new TriggerRegistry();
    private location?: HxLocation;

    constructor(snapshot: RequestSnapshot = RequestSnapshot.empty()) {
        this.snapshot = snapshot;
        this.isHtmx = snapshot.isHtmx;
        this.boosted = snapshot.boosted;
        this.historyRestoreRequest = snapshot.historyRestoreRequest;
    }

    /**
     * @param headers - header name -> values; names are matched case-insensitively
     */
    static fromHeaders(headers: Map<string, string[]>): HtmxContext {
        return HtmxContext.fromReader(new MapHeaderReader(headers));
    }

    static fromReader(reader: HeaderReader): HtmxContext {
        return new HtmxContext(RequestSnapshot.read(reader));
    }

    currentUrl(): string | undefined {
        return this.snapshot.currentUrl;
    }

    target(): string | undefined {
        return this.snapshot.target;
    }

    triggerName(): string | undefined {
        return this.snapshot.triggerName;
    }

    /**
     * Id of the element that triggered the request (the HX-Trigger request header).
     */
    triggerId(): string | undefined {
        return this.snapshot.triggerId;
    }

    prompt(): string | undefined {
        return this.snapshot.prompt;
    }

    /**
     * Full client-side redirect (HX-Redirect). Ignored at flush time when a
     * location has been set.
     */
    redirect(url: string): void {
        this.directives.set(HtmxResponseHeaders.REDIRECT, url);
    }

    /**
     * Navigate with an htmx swap instead of a full page load (HX-Location).
     */
    redirectWithSwap(path: string): void {
        this.location = new HxLocation(path);
    }

    redirectWithLocation(location: HxLocation): void {
        this.location = location;
    }

    refresh(): void {
        this.directives.set(HtmxResponseHeaders.REFRESH, TRUE_TOKEN);
    }

    retarget(selector: string): void {
        this.directives.set(HtmxResponseHeaders.RETARGET, selector);
    }

    reselect(selector: string): void {
        this.directives.set(HtmxResponseHeaders.RESELECT, selector);
    }

    reswap(swapType: SwapType): void {
        this.directives.set(HtmxResponseHeaders.RESWAP, swapType);
    }

    pushUrl(url: string): void {
        this.directives.set(HtmxResponseHeaders.PUSH_URL, url);
    }

    replaceUrl(url: string): void {
        this.directives.set(HtmxResponseHeaders.REPLACE_URL, url);
    }

    /**
     * Ask the client to fire an event. Triggering the same name twice in one
     * stage keeps a single event carrying the last payload.
     *
     * @throws InvalidTriggerNameError when name is empty
     */
    triggerEvent(name: string, payload?: TriggerPayload, stage: TriggerStage = TriggerStage.STANDARD): void {
        this.triggers.add(name, payload, stage);
    }

    getTriggers(stage: TriggerStage): TriggerEntry[] {
        return this.triggers.entries(stage);
    }

    getLocation(): HxLocation | undefined {
        return this.location;
    }

    /**
     * Serialize the triggers and the location into the queued directives and
     * return every response header to write, in insertion order.
     */
    flush(): Map<string, string> {
        for (const stage of TRIGGER_STAGES) {
            const value = this.triggers.serialize(stage);
            if (value !== undefined) {
                this.directives.set(headerForStage(stage), value);
            }
        }

        if (this.location) {
            this.directives.set(HtmxResponseHeaders.LOCATION, this.location.toHeaderValue());
            this.directives.delete(HtmxResponseHeaders.REDIRECT);
        }

        return this.directives.toHeaderMap();
    }
}
