/**
 * RouterResponse - Minimal abstraction over the outgoing HTTP response.
 *
 * Implementations:
 * - ExpressRouterResponse - wraps Express Response
 */
export interface RouterResponse {
    setStatus(code: number): void;

    /**
     * Set a response header. Returns false when the value was rejected and
     * not written.
     */
    setHeader(name: string, value: string): boolean;

    /**
     * Send response body and end the response.
     */
    send(body: string): void;

    /**
     * Check if headers have already been sent.
     * Used to prevent double-sending responses.
     */
    isHeadersSent(): boolean;
}
