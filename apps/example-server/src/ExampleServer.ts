import express, { Express } from 'express';
import { Container } from 'inversify';
import { HtmxConfig, HtmxFilter, HtmxRoutes, createHtmxModule } from '@hxwire/htmx-server';
import { TodoController } from './controllers/TodoController';
import { AppModule } from './modules/AppModule';

type HttpServer = ReturnType<Express['listen']>;

/**
 * ExampleServer - Wires the todo application together.
 *
 * 1. Loads the htmx bindings and the application bindings into one container
 * 2. Puts every TodoController route behind HtmxFilter
 * 3. Serves the routes with Express
 *
 * Tests use create() and getRoutes() without ever calling start().
 */
export class ExampleServer {
    private server?: HttpServer;

    private constructor(private readonly routes: HtmxRoutes) {}

    static async create(config: HtmxConfig = new HtmxConfig(true)): Promise<ExampleServer> {
        const container = new Container();
        await container.load(createHtmxModule(config));
        await container.load(AppModule);

        const controller = container.get(TodoController);
        const routes = new HtmxRoutes([container.get(HtmxFilter)])
            .addRoute('GET', '/', 'index', (meta) => controller.index(meta))
            .addRoute('POST', '/todos', 'addTodo', (meta) => controller.addTodo(meta))
            .addRoute('POST', '/todos/clear', 'clearTodos', (meta) => controller.clearTodos(meta))
            .addRoute('GET', '/legacy', 'legacy', (meta) => controller.legacy(meta));

        return new ExampleServer(routes);
    }

    getRoutes(): HtmxRoutes {
        return this.routes;
    }

    async start(port: number = 8200): Promise<void> {
        const app = express();
        const routeCount = this.routes.registerWith(app);

        await new Promise<void>((resolve, reject) => {
            const server = app.listen(port, () => {
                console.log(`[ExampleServer] Server listening on http://localhost:${port}`);
                console.log(`[ExampleServer] Registered ${routeCount} routes`);
                resolve();
            });
            server.on('error', (err: Error) => {
                console.error('[ExampleServer] Failed to start server:', err);
                reject(err);
            });
            this.server = server;
        });
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    console.error('[ExampleServer] Error stopping server:', err);
                    reject(err);
                    return;
                }
                console.log('[ExampleServer] Server stopped');
                resolve();
            });
        });
        this.server = undefined;
    }
}
