import 'reflect-metadata';
import { toError } from '@hxwire/core-util';
import { ExampleServer } from './ExampleServer';

/**
 * Main entry point for the todo application.
 */
async function main(): Promise<void> {
    try {
        console.log('[Server] Starting todo server...');
        const server = await ExampleServer.create();

        const port = parseInt(process.env['PORT'] || '8200', 10);
        await server.start(port);

        await new Promise<void>((resolve) => {
            process.on('SIGTERM', () => {
                console.log('[Server] Received SIGTERM signal, shutting down...');
                resolve();
            });
            process.on('SIGINT', () => {
                console.log('[Server] Received SIGINT signal, shutting down...');
                resolve();
            });
        });

        await server.stop();
    } catch (err: unknown) {
        const error = toError(err);
        console.error('[Server] Error during startup:', error);
        process.exit(1);
    }
}

main().catch((err: unknown) => {
    console.error('[Server] Unexpected failure:', toError(err));
    process.exit(1);
});

export { main };
