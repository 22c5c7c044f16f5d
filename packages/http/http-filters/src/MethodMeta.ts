/**
 * Static information about a registered route.
 */
export class RouteMeta {
    constructor(
        public readonly httpMethod: string,
        public readonly path: string,
        public readonly methodName: string,
    ) {}
}

/**
 * Metadata about the request being handled.
 * Passed to filters and to the final handler.
 *
 * Fields:
 * - routeMeta: Static route information (httpMethod, path, methodName)
 * - requestHeaders: HTTP headers from the request
 * - requestBody: The raw request body, when one was read
 * - metadata: Request-scoped data for filters to communicate
 */
export class MethodMeta {
    routeMeta: RouteMeta;

    /**
     * Map of header name (lowercase) -> array of values.
     *
     * HTTP allows multiple values for the same header name,
     * so values are kept as string[] even though most headers have one.
     */
    requestHeaders: Map<string, string[]>;

    requestBody?: string;

    /**
     * Used by filters to pass data to other filters and the handler.
     */
    metadata: Map<string, unknown>;

    constructor(
        routeMeta: RouteMeta,
        requestHeaders?: Map<string, string[]>,
        requestBody?: string,
        metadata?: Map<string, unknown>,
    ) {
        this.routeMeta = routeMeta;
        this.requestHeaders = requestHeaders ?? new Map();
        this.requestBody = requestBody;
        this.metadata = metadata ?? new Map();
    }

    get httpMethod(): string {
        return this.routeMeta.httpMethod;
    }

    get path(): string {
        return this.routeMeta.path;
    }

    get methodName(): string {
        return this.routeMeta.methodName;
    }
}
