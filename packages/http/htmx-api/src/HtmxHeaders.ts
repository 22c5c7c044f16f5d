import { HtmxHeader } from './HtmxHeader';

/**
 * The token htmx uses for true in flag headers, both directions.
 */
export const TRUE_TOKEN = 'true';

/**
 * Headers the htmx client sends with its requests.
 */
export class HtmxRequestHeaders {
    /** Always 'true' on requests issued by htmx. */
    static readonly REQUEST = new HtmxHeader('HX-Request');

    /** 'true' when the request comes from an element using hx-boost. */
    static readonly BOOSTED = new HtmxHeader('HX-Boosted');

    /** The current URL of the browser. */
    static readonly CURRENT_URL = new HtmxHeader('HX-Current-URL');

    /** 'true' when the request restores history after a cache miss. */
    static readonly HISTORY_RESTORE_REQUEST = new HtmxHeader('HX-History-Restore-Request');

    /** The user response to an hx-prompt. */
    static readonly PROMPT = new HtmxHeader('HX-Prompt');

    /** The id of the target element, if it has one. */
    static readonly TARGET = new HtmxHeader('HX-Target');

    /** The id of the triggered element, if it has one. */
    static readonly TRIGGER = new HtmxHeader('HX-Trigger');

    /** The name of the triggered element, if it has one. */
    static readonly TRIGGER_NAME = new HtmxHeader('HX-Trigger-Name');
}

/**
 * Headers a server sends back to steer the htmx client.
 */
export class HtmxResponseHeaders {
    /** Client-side navigation without a full reload; a path or a JSON descriptor. */
    static readonly LOCATION = new HtmxHeader('HX-Location');

    /** Push a URL into the history stack. */
    static readonly PUSH_URL = new HtmxHeader('HX-Push-Url');

    /** Full client-side redirect to a new location. */
    static readonly REDIRECT = new HtmxHeader('HX-Redirect');

    /** Full refresh of the page. */
    static readonly REFRESH = new HtmxHeader('HX-Refresh');

    /** Replace the current URL in the location bar. */
    static readonly REPLACE_URL = new HtmxHeader('HX-Replace-Url');

    /** Override how the response will be swapped. */
    static readonly RESWAP = new HtmxHeader('HX-Reswap');

    /** CSS selector that overrides the target of the swap. */
    static readonly RETARGET = new HtmxHeader('HX-Retarget');

    /** CSS selector choosing which part of the response is swapped in. */
    static readonly RESELECT = new HtmxHeader('HX-Reselect');

    /** Client-side events fired as soon as the response is received. */
    static readonly TRIGGER = new HtmxHeader('HX-Trigger');

    /** Client-side events fired after the swap step. */
    static readonly TRIGGER_AFTER_SWAP = new HtmxHeader('HX-Trigger-After-Swap');

    /** Client-side events fired after the settle step. */
    static readonly TRIGGER_AFTER_SETTLE = new HtmxHeader('HX-Trigger-After-Settle');
}
