import { Response } from 'express';
import { toError } from '@hxwire/core-util';
import { RouterResponse } from '../RouterResponse';

/**
 * ExpressRouterResponse - Express implementation of RouterResponse interface.
 */
export class ExpressRouterResponse implements RouterResponse {
    private res: Response;

    constructor(res: Response) {
        this.res = res;
    }

    setStatus(code: number): void {
        this.res.status(code);
    }

    /**
     * Node rejects header values with characters outside latin1 or with
     * control characters. Such a header is logged and skipped.
     */
    setHeader(name: string, value: string): boolean {
        try {
            this.res.setHeader(name, value);
            return true;
        } catch (err: unknown) {
            const error = toError(err);
            console.warn(`[ExpressRouterResponse] Skipped header ${name}: ${error.message}`);
            return false;
        }
    }

    send(body: string): void {
        this.res.send(body);
    }

    isHeadersSent(): boolean {
        return this.res.headersSent;
    }
}
