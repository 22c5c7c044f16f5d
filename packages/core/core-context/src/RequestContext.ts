import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped storage using AsyncLocalStorage.
 *
 * Values put inside a `run()` block stay visible to everything awaited from
 * that block, and disappear when it finishes. The Express adapter opens one
 * block per request, which is how handlers reach the request's htmx context
 * without threading it through every call.
 *
 * Example usage:
 * ```typescript
 * await RequestContext.run(async () => {
 *     RequestContext.put('REQUEST_PATH', '/todos');
 *     await handler();
 *     RequestContext.get('REQUEST_PATH'); // '/todos'
 * });
 * ```
 */
class RequestContextImpl {
    private storage: AsyncLocalStorage<Map<string, unknown>>;

    constructor() {
        this.storage = new AsyncLocalStorage<Map<string, unknown>>();
    }

    /**
     * Run a function with a new, empty context.
     */
    run<T>(fn: () => T): T {
        return this.storage.run(new Map<string, unknown>(), fn);
    }

    /**
     * Store a value in the current context.
     * Throws when called outside run().
     */
    put(key: string, value: unknown): void {
        const store = this.storage.getStore();
        if (!store) {
            throw new Error('No context available. Did you call RequestContext.run() first?');
        }
        store.set(key, value);
    }

    /**
     * Retrieve a value from the current context. Callers narrow the result.
     */
    get(key: string): unknown {
        return this.storage.getStore()?.get(key);
    }

    remove(key: string): void {
        this.storage.getStore()?.delete(key);
    }

    has(key: string): boolean {
        return this.storage.getStore()?.has(key) ?? false;
    }

    /**
     * True when called from inside a run() block.
     */
    isActive(): boolean {
        return this.storage.getStore() !== undefined;
    }
}

/**
 * Global singleton instance of RequestContext.
 */
export const RequestContext = new RequestContextImpl();
