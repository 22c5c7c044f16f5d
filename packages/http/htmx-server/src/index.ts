/**
 * @hxwire/htmx-server
 *
 * Runs the htmx layer inside an HTTP server: HtmxFilter builds and flushes
 * the per-request HtmxContext, ExpressWrapper and HtmxRoutes connect the
 * filter chain to Express, HtmxModule provides the DI bindings.
 */
import 'reflect-metadata';

export { HtmxConfig, HTMX_TYPES } from './HtmxConfig';
export { HtmxFilter } from './HtmxFilter';
export { HTMX_METADATA_KEY, htmxFrom, currentHtmx } from './htmxAccess';
export { HtmxModule, createHtmxModule } from './HtmxModule';
export { RouterRequest } from './RouterRequest';
export { RouterResponse } from './RouterResponse';
export { ExpressRouterRequest } from './express/ExpressRouterRequest';
export { ExpressRouterResponse } from './express/ExpressRouterResponse';
export { ExpressWrapper, escapeHtml } from './ExpressWrapper';
export { HtmxRoutes, RouteHandler } from './HtmxRoutes';
export { InMemoryRouterRequest, InMemoryRouterResponse } from './testing/InMemoryRouter';
