import { injectable } from 'inversify';

export const HTMX_TYPES = {
    HtmxConfig: Symbol.for('HtmxConfig'),
};

/**
 * Configuration for HtmxFilter.
 * Register this in your DI container to customize HtmxFilter behavior.
 *
 * Example:
 * ```typescript
 * const container = new Container();
 * await container.load(createHtmxModule(new HtmxConfig(true))); // logging enabled
 * ```
 */
@injectable()
export class HtmxConfig {
    /**
     * Log the htmx headers written for every request.
     * Default: false
     */
    loggingEnabled: boolean;

    constructor(loggingEnabled: boolean = false) {
        this.loggingEnabled = loggingEnabled;
    }
}
