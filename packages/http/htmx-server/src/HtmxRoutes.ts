import { Express } from 'express';
import { Filter, FilterChain, MethodMeta, ResponseWrapper, RouteMeta } from '@hxwire/http-filters';
import { ExpressWrapper } from './ExpressWrapper';

/**
 * A route's final handler, run after every filter.
 */
export type RouteHandler = (meta: MethodMeta) => Promise<ResponseWrapper<unknown>>;

/**
 * HtmxRoutes - Puts route handlers behind one filter chain and registers
 * them on an Express app.
 *
 * ```typescript
 * const htmxFilter = container.get(HtmxFilter);
 * const routes = new HtmxRoutes([htmxFilter])
 *     .addRoute('GET', '/', 'index', (meta) => controller.index(meta))
 *     .addRoute('POST', '/todos', 'addTodo', (meta) => controller.addTodo(meta));
 *
 * const app = express();
 * routes.registerWith(app);
 * ```
 */
export class HtmxRoutes {
    private readonly chain: FilterChain<MethodMeta, ResponseWrapper<unknown>>;
    private readonly wrappers = new Map<string, ExpressWrapper>();
    private readonly routeMetas: RouteMeta[] = [];

    constructor(filters: Filter<MethodMeta, ResponseWrapper<unknown>>[]) {
        this.chain = new FilterChain(filters);
    }

    addRoute(httpMethod: string, path: string, methodName: string, handler: RouteHandler): this {
        const routeMeta = new RouteMeta(httpMethod.toUpperCase(), path, methodName);
        const key = HtmxRoutes.routeKey(routeMeta.httpMethod, path);
        if (this.wrappers.has(key)) {
            throw new Error(`Route ${routeMeta.httpMethod} ${path} is already registered`);
        }

        this.wrappers.set(key, new ExpressWrapper(this.chain.toService(handler), routeMeta));
        this.routeMetas.push(routeMeta);
        return this;
    }

    getRoutes(): RouteMeta[] {
        return [...this.routeMetas];
    }

    /**
     * The wrapper serving a route, e.g. to drive it with an in-memory request.
     */
    getWrapper(httpMethod: string, path: string): ExpressWrapper | undefined {
        return this.wrappers.get(HtmxRoutes.routeKey(httpMethod.toUpperCase(), path));
    }

    /**
     * @returns Number of routes registered
     */
    registerWith(app: Express): number {
        let count = 0;
        for (const routeMeta of this.routeMetas) {
            const wrapper = this.getWrapper(routeMeta.httpMethod, routeMeta.path);
            if (wrapper && this.registerHandler(app, routeMeta, wrapper)) {
                count++;
            }
        }
        return count;
    }

    private registerHandler(app: Express, routeMeta: RouteMeta, wrapper: ExpressWrapper): boolean {
        const handler = wrapper.execute.bind(wrapper);

        switch (routeMeta.httpMethod.toLowerCase()) {
            case 'get':
                app.get(routeMeta.path, handler);
                return true;
            case 'post':
                app.post(routeMeta.path, handler);
                return true;
            case 'put':
                app.put(routeMeta.path, handler);
                return true;
            case 'delete':
                app.delete(routeMeta.path, handler);
                return true;
            case 'patch':
                app.patch(routeMeta.path, handler);
                return true;
            default:
                console.warn(`[HtmxRoutes] Unknown HTTP method: ${routeMeta.httpMethod}`);
                return false;
        }
    }

    private static routeKey(httpMethod: string, path: string): string {
        return `${httpMethod} ${path}`;
    }
}
