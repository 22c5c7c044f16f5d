import { ContainerModule } from 'inversify';
import { HTMX_TYPES, HtmxConfig } from './HtmxConfig';
import { HtmxFilter } from './HtmxFilter';

/**
 * Build the DI bindings for the htmx layer.
 *
 * Binds the given HtmxConfig (or the defaults) and HtmxFilter as a singleton.
 * HtmxFilter holds no request state, so one instance serves every request.
 */
export function createHtmxModule(config: HtmxConfig = new HtmxConfig()): ContainerModule {
    return new ContainerModule((options) => {
        const { bind } = options;

        bind<HtmxConfig>(HTMX_TYPES.HtmxConfig).toConstantValue(config);
        bind<HtmxFilter>(HtmxFilter).toSelf().inSingletonScope();
    });
}

/**
 * HtmxModule - The htmx bindings with the default configuration.
 */
export const HtmxModule = createHtmxModule();
