/**
 * HtmxHeader - One of the fixed HTTP headers htmx reads or writes.
 *
 * Instances are only created by HtmxRequestHeaders and HtmxResponseHeaders,
 * so a header can be used as a map key and compared by identity.
 */
export class HtmxHeader {
    /**
     * Canonical header name (e.g. 'HX-Request').
     * Lookups against incoming requests are case-insensitive.
     */
    readonly headerName: string;

    constructor(headerName: string) {
        this.headerName = headerName;
    }

    /**
     * Lowercase form, the way Node.js exposes incoming header names.
     */
    getLookupName(): string {
        return this.headerName.toLowerCase();
    }
}
