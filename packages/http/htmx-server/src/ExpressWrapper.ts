import { Request, Response } from 'express';
import { RequestContext } from '@hxwire/core-context';
import { toError } from '@hxwire/core-util';
import { MethodMeta, ResponseWrapper, RouteMeta, Service } from '@hxwire/http-filters';
import { ExpressRouterRequest } from './express/ExpressRouterRequest';
import { ExpressRouterResponse } from './express/ExpressRouterResponse';
import { RouterRequest } from './RouterRequest';
import { RouterResponse } from './RouterResponse';

const BODY_METHODS = ['POST', 'PUT', 'PATCH', 'DELETE'];

/**
 * Escape text for an HTML body.
 */
export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * ExpressWrapper - Runs one route's filter chain for each request.
 *
 * For every request:
 * 1. Open a RequestContext so currentHtmx() works inside the handler
 * 2. Build MethodMeta from the headers and, for POST/PUT/PATCH/DELETE, the body
 * 3. Invoke the service (filter chain + handler)
 * 4. Write status, headers and body
 *
 * Logs the start and the end of every request.
 * Strings are sent as text/html, anything else as JSON.
 */
export class ExpressWrapper {
    constructor(
        private service: Service<MethodMeta, ResponseWrapper<unknown>>,
        private routeMeta: RouteMeta,
    ) {}

    async execute(req: Request, res: Response): Promise<void> {
        await this.handle(new ExpressRouterRequest(req), new ExpressRouterResponse(res));
    }

    async handle(request: RouterRequest, response: RouterResponse): Promise<void> {
        const method = request.getMethod();
        const path = request.getPath();
        console.log('[ExpressWrapper] Request START:', method, path);

        await RequestContext.run(async () => {
            try {
                let body: string | undefined;
                if (BODY_METHODS.includes(method.toUpperCase())) {
                    body = await request.readBody();
                }

                const meta = new MethodMeta(this.routeMeta, request.getHeaderValues(), body);
                const wrapper = await this.service.invoke(meta);
                this.writeResponse(response, wrapper);
                console.log('[ExpressWrapper] Request END (success):', method, path, wrapper.statusCode);
            } catch (err: unknown) {
                this.handleError(response, err);
                console.log('[ExpressWrapper] Request END (error):', method, path);
            }
        });
    }

    private writeResponse(response: RouterResponse, wrapper: ResponseWrapper<unknown>): void {
        response.setStatus(wrapper.statusCode);

        const body = wrapper.response;
        if (typeof body === 'string') {
            response.setHeader('Content-Type', 'text/html; charset=utf-8');
        } else if (body !== undefined) {
            response.setHeader('Content-Type', 'application/json');
        }

        for (const [name, value] of wrapper.headers) {
            response.setHeader(name, value);
        }

        if (body === undefined) {
            response.send('');
        } else if (typeof body === 'string') {
            response.send(body);
        } else {
            response.send(JSON.stringify(body));
        }
    }

    /**
     * Answer with an HTML 500 page, unless the response is already on its way.
     */
    handleError(response: RouterResponse, err: unknown): void {
        const error = toError(err);
        console.error(`[ExpressWrapper] ${this.routeMeta.httpMethod} ${this.routeMeta.path} failed:`, error);

        if (response.isHeadersSent()) {
            return;
        }

        response.setStatus(500);
        response.setHeader('Content-Type', 'text/html; charset=utf-8');
        response.send(
            '<!DOCTYPE html>\n' +
                '<html>\n' +
                '<head><title>Server Error</title></head>\n' +
                '<body>\n' +
                '<h1>You hit a server error</h1>\n' +
                `<pre>${escapeHtml(error.message)}</pre>\n` +
                '</body>\n' +
                '</html>\n',
        );
    }
}
