import { HtmxHeader, HtmxRequestHeaders, TRUE_TOKEN } from '@hxwire/htmx-api';
import { HeaderReader } from './HeaderReader';

// visible ASCII, space and tab: what an HTTP header value may hold as text
const HEADER_TEXT = /^[\t\x20-\x7e]*$/;

/**
 * Fields of a RequestSnapshot.
 */
export interface RequestSnapshotFields {
    isHtmx: boolean;
    boosted: boolean;
    historyRestoreRequest: boolean;
    currentUrl?: string;
    target?: string;
    triggerName?: string;
    triggerId?: string;
    prompt?: string;
}

/**
 * RequestSnapshot - The htmx request headers of one request, parsed once.
 *
 * Parsing never fails. A flag is true only for the exact token 'true';
 * an absent header, a value that is not header text, or any other token
 * reads as false (flags) or undefined (text).
 */
export class RequestSnapshot {
    /** HX-Request */
    readonly isHtmx: boolean;
    /** HX-Boosted */
    readonly boosted: boolean;
    /** HX-History-Restore-Request */
    readonly historyRestoreRequest: boolean;
    /** HX-Current-URL */
    readonly currentUrl?: string;
    /** HX-Target */
    readonly target?: string;
    /** HX-Trigger-Name */
    readonly triggerName?: string;
    /** HX-Trigger: the id of the element that triggered the request */
    readonly triggerId?: string;
    /** HX-Prompt */
    readonly prompt?: string;

    constructor(fields: RequestSnapshotFields) {
        this.isHtmx = fields.isHtmx;
        this.boosted = fields.boosted;
        this.historyRestoreRequest = fields.historyRestoreRequest;
        this.currentUrl = fields.currentUrl;
        this.target = fields.target;
        this.triggerName = fields.triggerName;
        this.triggerId = fields.triggerId;
        this.prompt = fields.prompt;
        Object.freeze(this);
    }

    static read(reader: HeaderReader): RequestSnapshot {
        return new RequestSnapshot({
            isHtmx: readFlag(reader, HtmxRequestHeaders.REQUEST),
            boosted: readFlag(reader, HtmxRequestHeaders.BOOSTED),
            historyRestoreRequest: readFlag(reader, HtmxRequestHeaders.HISTORY_RESTORE_REQUEST),
            currentUrl: readText(reader, HtmxRequestHeaders.CURRENT_URL),
            target: readText(reader, HtmxRequestHeaders.TARGET),
            triggerName: readText(reader, HtmxRequestHeaders.TRIGGER_NAME),
            triggerId: readText(reader, HtmxRequestHeaders.TRIGGER),
            prompt: readText(reader, HtmxRequestHeaders.PROMPT),
        });
    }

    /**
     * Snapshot of a request without any htmx header.
     */
    static empty(): RequestSnapshot {
        return new RequestSnapshot({ isHtmx: false, boosted: false, historyRestoreRequest: false });
    }
}

function readText(reader: HeaderReader, header: HtmxHeader): string | undefined {
    const value = reader.read(header);
    if (value === undefined || !HEADER_TEXT.test(value)) {
        return undefined;
    }
    return value;
}

function readFlag(reader: HeaderReader, header: HtmxHeader): boolean {
    return readText(reader, header) === TRUE_TOKEN;
}
