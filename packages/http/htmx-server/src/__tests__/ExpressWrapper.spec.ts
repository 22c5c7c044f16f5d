import { currentHtmx, htmxFrom } from '../htmxAccess';
import { ExpressWrapper, escapeHtml } from '../ExpressWrapper';
import { HtmxFilter } from '../HtmxFilter';
import { FilterChain, MethodMeta, ResponseWrapper, RouteMeta } from '@hxwire/http-filters';
import { HxLocation, TriggerPayload } from '@hxwire/htmx-api';
import { InMemoryRouterRequest, InMemoryRouterResponse } from '../testing/InMemoryRouter';

function wrap(
    httpMethod: string,
    path: string,
    handler: (meta: MethodMeta) => Promise<ResponseWrapper<unknown>>,
): ExpressWrapper {
    const chain = new FilterChain([new HtmxFilter()]);
    return new ExpressWrapper(chain.toService(handler), new RouteMeta(httpMethod, path, 'handler'));
}

describe('ExpressWrapper', () => {
    let errorLog: jest.SpyInstance;
    let infoLog: jest.SpyInstance;

    beforeEach(() => {
        errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        infoLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorLog.mockRestore();
        infoLog.mockRestore();
    });

    it('should write status, htmx headers and an HTML body', async () => {
        const wrapper = wrap('GET', '/', async (meta) => {
            const htmx = htmxFrom(meta);
            htmx.retarget(htmx.target() ?? '#main');
            return new ResponseWrapper('<ul id="todos"></ul>');
        });
        const request = new InMemoryRouterRequest('GET', '/', new Map([['hx-target', ['#todos']]]));
        const response = new InMemoryRouterResponse();

        await wrapper.handle(request, response);

        expect(response.status).toBe(200);
        expect([...response.headers.entries()]).toEqual([
            ['Content-Type', 'text/html; charset=utf-8'],
            ['HX-Retarget', '#todos'],
        ]);
        expect(response.body).toBe('<ul id="todos"></ul>');
        expect(request.bodyReads).toBe(0);
    });

    it('should read the body for POST requests', async () => {
        let body: string | undefined;
        const wrapper = wrap('POST', '/todos', async (meta) => {
            body = meta.requestBody;
            return new ResponseWrapper('<li>milk</li>', 201);
        });
        const request = new InMemoryRouterRequest('POST', '/todos', new Map(), 'title=milk');
        const response = new InMemoryRouterResponse();

        await wrapper.handle(request, response);

        expect(body).toBe('title=milk');
        expect(request.bodyReads).toBe(1);
        expect(response.status).toBe(201);
    });

    it('should send non-string bodies as JSON', async () => {
        const wrapper = wrap('GET', '/todos.json', async () => new ResponseWrapper([{ id: 1, title: 'milk' }]));
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('GET', '/todos.json'), response);

        expect(response.headers.get('Content-Type')).toBe('application/json');
        expect(response.body).toBe('[{"id":1,"title":"milk"}]');
    });

    it('should send an empty body when the handler returns none', async () => {
        const wrapper = wrap('POST', '/todos/clear', async (meta) => {
            htmxFrom(meta).refresh();
            return new ResponseWrapper();
        });
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('POST', '/todos/clear'), response);

        expect([...response.headers.entries()]).toEqual([['HX-Refresh', 'true']]);
        expect(response.body).toBe('');
    });

    it('should make the context reachable through currentHtmx', async () => {
        const wrapper = wrap('GET', '/legacy', async () => {
            currentHtmx().redirectWithLocation(new HxLocation('/').target('#todos'));
            return new ResponseWrapper('');
        });
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('GET', '/legacy'), response);

        expect(response.headers.get('HX-Location')).toBe('{"path":"/","target":"#todos"}');
    });

    it('should skip a header value the response refuses and write the rest', async () => {
        const wrapper = wrap('GET', '/', async (meta) => {
            const htmx = htmxFrom(meta);
            htmx.retarget('#bad\nselector');
            htmx.triggerEvent('ok');
            return new ResponseWrapper('<p></p>');
        });
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('GET', '/'), response);

        expect(response.headers.has('HX-Retarget')).toBe(false);
        expect(response.headers.get('HX-Trigger')).toBe('ok');
        expect(response.status).toBe(200);
    });

    it('should answer a failing handler with an HTML 500 page and no htmx headers', async () => {
        const wrapper = wrap('POST', '/todos', async (meta) => {
            htmxFrom(meta).triggerEvent('never-sent');
            throw new Error('title <missing>');
        });
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('POST', '/todos'), response);

        expect(response.status).toBe(500);
        expect([...response.headers.keys()]).toEqual(['Content-Type']);
        expect(response.body).toContain('<pre>title &lt;missing&gt;</pre>');
        expect(errorLog).toHaveBeenCalledTimes(1);
    });

    it('should answer a payload that cannot be encoded with a 500', async () => {
        const wrapper = wrap('GET', '/', async (meta) => {
            htmxFrom(meta).triggerEvent('count', TriggerPayload.number(Number.NaN));
            return new ResponseWrapper('');
        });
        const response = new InMemoryRouterResponse();

        await wrapper.handle(new InMemoryRouterRequest('GET', '/'), response);

        expect(response.status).toBe(500);
        expect(response.body).toContain('<pre>Cannot encode non-finite number NaN as JSON</pre>');
    });

    it('should log the start and end of a request', async () => {
        const wrapper = wrap('POST', '/todos', async () => new ResponseWrapper('<li>milk</li>', 201));

        const request = new InMemoryRouterRequest('POST', '/todos', new Map(), 'title=milk');

        await wrapper.handle(request, new InMemoryRouterResponse());

        expect(infoLog.mock.calls).toEqual([
            ['[ExpressWrapper] Request START:', 'POST', '/todos'],
            ['[ExpressWrapper] Request END (success):', 'POST', '/todos', 201],
        ]);
    });

    it('should log the end of a failed request', async () => {
        const wrapper = wrap('GET', '/boom', async () => {
            throw new Error('boom');
        });

        await wrapper.handle(new InMemoryRouterRequest('GET', '/boom'), new InMemoryRouterResponse());

        expect(infoLog.mock.calls).toEqual([
            ['[ExpressWrapper] Request START:', 'GET', '/boom'],
            ['[ExpressWrapper] Request END (error):', 'GET', '/boom'],
        ]);
    });

    it('should write nothing when the response was already sent', async () => {
        const response = new InMemoryRouterResponse();
        response.headersSent = true;
        const wrapper = wrap('GET', '/', async () => new ResponseWrapper(''));

        wrapper.handleError(response, new Error('late failure'));

        expect(response.status).toBeUndefined();
        expect(response.body).toBeUndefined();
        expect(errorLog).toHaveBeenCalledTimes(1);
    });
});

describe('escapeHtml', () => {
    it('should escape markup characters', () => {
        expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
            '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
        );
    });
});
