/**
 * Service interface - anything that takes a request and produces a response.
 *
 * Used for:
 * - Final handler invocation
 * - Wrapping filters as services in the chain
 */
export interface Service<REQ, RESP> {
    invoke(meta: REQ): Promise<RESP>;
}

/**
 * Filter abstract class - wraps the execution of the filters after it and the
 * final handler.
 *
 * Filters are STATELESS and can handle N concurrent requests. Request data
 * travels in REQ (usually MethodMeta), never in instance fields.
 *
 * Example:
 * ```typescript
 * @injectable()
 * export class TimingFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
 *     async filter(
 *         meta: MethodMeta,
 *         nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
 *     ): Promise<ResponseWrapper<unknown>> {
 *         const start = Date.now();
 *         const response = await nextFilter.invoke(meta);
 *         console.log(`[TimingFilter] ${meta.path} took ${Date.now() - start}ms`);
 *         return response;
 *     }
 * }
 * ```
 *
 * Composition:
 * ```typescript
 * const service = htmxFilter.chain(timingFilter).chainService(handler);
 * const response = await service.invoke(meta);
 * ```
 */
export abstract class Filter<REQ, RESP> {
    //order is determined by how filters are chained, there is no priority field

    abstract filter(meta: REQ, nextFilter: Service<REQ, RESP>): Promise<RESP>;

    /**
     * Compose this filter with the one that runs inside it.
     */
    chain(nextFilter: Filter<REQ, RESP>): Filter<REQ, RESP> {
        const outer = this;

        return new (class extends Filter<REQ, RESP> {
            async filter(meta: REQ, nextService: Service<REQ, RESP>): Promise<RESP> {
                return outer.filter(meta, {
                    invoke: (m: REQ) => nextFilter.filter(m, nextService),
                });
            }
        })();
    }

    /**
     * End the chain in the final handler.
     */
    chainService(svc: Service<REQ, RESP>): Service<REQ, RESP> {
        const outer = this;

        return {
            invoke: (meta: REQ) => outer.filter(meta, svc),
        };
    }
}
