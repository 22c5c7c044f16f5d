import { inject, injectable, optional } from 'inversify';
import { RequestContext } from '@hxwire/core-context';
import { HtmxContext } from '@hxwire/htmx-core';
import { Filter, MethodMeta, ResponseWrapper, Service } from '@hxwire/http-filters';
import { HTMX_TYPES, HtmxConfig } from './HtmxConfig';
import { HTMX_METADATA_KEY } from './htmxAccess';

/**
 * HtmxFilter - Gives every request an HtmxContext and writes its directives
 * onto the response.
 *
 * Responsibilities:
 * 1. Build the HtmxContext from the request headers
 * 2. Make it reachable through htmxFrom(meta) and currentHtmx()
 * 3. Flush it once after the rest of the chain returns
 * 4. Copy the flushed headers onto the ResponseWrapper, replacing earlier values
 *
 * When the chain throws, nothing is flushed and the error propagates.
 */
@injectable()
export class HtmxFilter extends Filter<MethodMeta, ResponseWrapper<unknown>> {
    private readonly config: HtmxConfig;

    constructor(@inject(HTMX_TYPES.HtmxConfig) @optional() config?: HtmxConfig) {
        super();
        this.config = config ?? new HtmxConfig();
    }

    async filter(
        meta: MethodMeta,
        nextFilter: Service<MethodMeta, ResponseWrapper<unknown>>,
    ): Promise<ResponseWrapper<unknown>> {
        const htmx = HtmxContext.fromHeaders(meta.requestHeaders);

        meta.metadata.set(HTMX_METADATA_KEY, htmx);
        if (RequestContext.isActive()) {
            RequestContext.put(HTMX_METADATA_KEY, htmx);
        }

        const response = await nextFilter.invoke(meta);

        const headers = htmx.flush();
        for (const [name, value] of headers) {
            response.setHeader(name, value);
        }

        if (this.config.loggingEnabled) {
            this.logDirectives(meta, htmx, headers);
        }

        return response;
    }

    private logDirectives(meta: MethodMeta, htmx: HtmxContext, headers: Map<string, string>): void {
        const kind = htmx.isHtmx ? 'htmx' : 'plain';
        if (headers.size === 0) {
            console.log(`[HtmxFilter] ${meta.httpMethod} ${meta.path} (${kind}) no htmx headers`);
            return;
        }
        const written = [...headers].map(([name, value]) => `${name}=${value}`).join(' ');
        console.log(`[HtmxFilter] ${meta.httpMethod} ${meta.path} (${kind}) ${written}`);
    }
}
