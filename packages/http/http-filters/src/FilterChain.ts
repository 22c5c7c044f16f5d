import { Filter, Service } from './Filter';

/**
 * FilterChain - Runs an ordered list of filters, then the final handler.
 *
 * The first filter is the outermost one. Each filter calls
 * nextFilter.invoke() to run the rest of the chain.
 */
export class FilterChain<REQ, RESP> {
    private filters: Filter<REQ, RESP>[];

    constructor(filters: Filter<REQ, RESP>[]) {
        this.filters = filters;
    }

    /**
     * @param finalHandler - runs after every filter called through
     */
    async execute(meta: REQ, finalHandler: (meta: REQ) => Promise<RESP>): Promise<RESP> {
        return this.toService(finalHandler).invoke(meta);
    }

    /**
     * The whole chain as one Service, ready to be invoked per request.
     */
    toService(finalHandler: (meta: REQ) => Promise<RESP>): Service<REQ, RESP> {
        const filters = this.filters;

        const createServiceForIndex = (currentIndex: number): Service<REQ, RESP> => {
            return {
                invoke: async (m: REQ): Promise<RESP> => {
                    if (currentIndex < filters.length) {
                        const filter = filters[currentIndex];
                        return filter.filter(m, createServiceForIndex(currentIndex + 1));
                    }
                    return finalHandler(m);
                },
            };
        };

        return createServiceForIndex(0);
    }

    getFilters(): Filter<REQ, RESP>[] {
        return [...this.filters];
    }

    size(): number {
        return this.filters.length;
    }
}
