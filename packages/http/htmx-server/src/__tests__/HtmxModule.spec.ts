import { Container } from 'inversify';
import { HTMX_TYPES, HtmxConfig } from '../HtmxConfig';
import { HtmxFilter } from '../HtmxFilter';
import { HtmxModule, createHtmxModule } from '../HtmxModule';

describe('HtmxModule', () => {
    it('should bind the default config and a singleton filter', async () => {
        const container = new Container();
        await container.load(HtmxModule);

        const config = container.get<HtmxConfig>(HTMX_TYPES.HtmxConfig);
        const first = container.get(HtmxFilter);
        const second = container.get(HtmxFilter);

        expect(config.loggingEnabled).toBe(false);
        expect(first).toBeInstanceOf(HtmxFilter);
        expect(first).toBe(second);
    });

    it('should bind a given config', async () => {
        const container = new Container();
        const config = new HtmxConfig(true);
        await container.load(createHtmxModule(config));

        expect(container.get<HtmxConfig>(HTMX_TYPES.HtmxConfig)).toBe(config);
    });

    it('should build the filter without a config binding', () => {
        const container = new Container();
        container.bind(HtmxFilter).toSelf();

        expect(container.get(HtmxFilter)).toBeInstanceOf(HtmxFilter);
    });
});
