/**
 * RouterRequest - Minimal abstraction over the incoming HTTP request.
 *
 * Keeps ExpressWrapper independent of Express so it can be driven by an
 * in-memory request in tests.
 *
 * Implementations:
 * - ExpressRouterRequest - wraps Express Request
 */
export interface RouterRequest {
    /**
     * All request headers, keyed by lowercase name. Repeated headers keep
     * every value in arrival order.
     */
    getHeaderValues(): Map<string, string[]>;

    /**
     * Get the HTTP method (GET, POST, PUT, DELETE, etc.).
     */
    getMethod(): string;

    /**
     * Get the request path (e.g., '/todos').
     */
    getPath(): string;

    readBody(): Promise<string>;
}
