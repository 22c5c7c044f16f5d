import { Request } from 'express';
import { RouterRequest } from '../RouterRequest';

/**
 * ExpressRouterRequest - Express implementation of RouterRequest interface.
 */
export class ExpressRouterRequest implements RouterRequest {
    private req: Request;
    private headerCache: Map<string, string[]> | null = null;

    constructor(req: Request) {
        this.req = req;
    }

    /**
     * Header names are lowercase. Built from headersDistinct, so a header
     * sent twice keeps both values instead of Node's comma-joined string.
     */
    getHeaderValues(): Map<string, string[]> {
        if (this.headerCache) {
            return this.headerCache;
        }

        this.headerCache = new Map<string, string[]>();
        for (const [name, values] of Object.entries(this.req.headersDistinct)) {
            if (values) {
                this.headerCache.set(name.toLowerCase(), [...values]);
            }
        }

        return this.headerCache;
    }

    getMethod(): string {
        return this.req.method;
    }

    getPath(): string {
        return this.req.path;
    }

    readBody(): Promise<string> {
        return new Promise((resolve, reject) => {
            let body = '';
            this.req.on('data', (chunk: Buffer) => {
                body += chunk.toString();
            });
            this.req.on('end', () => {
                resolve(body);
            });
            this.req.on('error', (err: Error) => {
                reject(err);
            });
        });
    }
}
