/**
 * ResponseWrapper - Wraps handler responses for the filter chain.
 *
 * TResult is the handler's return type; the chain itself works with
 * ResponseWrapper<unknown>. Filters add headers here and the HTTP adapter
 * writes them out after the chain returns.
 */
export class ResponseWrapper<TResult = unknown> {
    response?: TResult;
    statusCode: number;
    headers: Map<string, string>;

    constructor(response?: TResult, statusCode: number = 200) {
        this.response = response;
        this.statusCode = statusCode;
        this.headers = new Map();
    }

    /**
     * Set a response header, replacing any earlier value for the same name.
     */
    setHeader(name: string, value: string): ResponseWrapper<TResult> {
        this.headers.set(name, value);
        return this;
    }

    static error<T = unknown>(message: string, statusCode: number = 500): ResponseWrapper<T> {
        const wrapper = new ResponseWrapper<T>(undefined, statusCode);
        wrapper.setHeader('X-Error', message);
        return wrapper;
    }
}
