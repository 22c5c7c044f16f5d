import { HxLocation } from '../HxLocation';
import { SwapType, parseSwapType } from '../SwapType';
import { PayloadSerializationError } from '../errors';

describe('HxLocation', () => {
    it('should send a bare path when nothing else is set', () => {
        const location = new HxLocation('/todos');

        expect(location.isPathOnly()).toBe(true);
        expect(location.toHeaderValue()).toBe('/todos');
    });

    it('should encode target, swap and values under their htmx key names', () => {
        const value = new HxLocation('/builder')
            .target('#content')
            .swap(SwapType.OuterHtml)
            .values({ id: 42, tags: ['a', 'b'] })
            .toHeaderValue();

        expect(value).toBe(
            '{"path":"/builder","target":"#content","swap":"outerHTML","values":{"id":42,"tags":["a","b"]}}',
        );

        const decoded = JSON.parse(value);
        expect(decoded.path).toBe('/builder');
        expect(decoded.target).toBe('#content');
        expect(parseSwapType(decoded.swap)).toBe(SwapType.OuterHtml);
        expect(decoded.values).toEqual({ id: 42, tags: ['a', 'b'] });
    });

    it('should encode every option', () => {
        const body = new HxLocation('/builder')
            .target('#content')
            .source('#button')
            .event('custom')
            .swap(SwapType.OuterHtml)
            .handler('handleResponse')
            .select('.fragment')
            .header('X-Test', '1')
            .values({ id: 42 })
            .pushPath('/history-path')
            .replace('/replace-path')
            .toBody();

        expect(body).toEqual({
            path: '/builder',
            target: '#content',
            source: '#button',
            event: 'custom',
            swap: 'outerHTML',
            headers: { 'X-Test': '1' },
            values: { id: 42 },
            handler: 'handleResponse',
            select: '.fragment',
            push: '/history-path',
            replace: '/replace-path',
        });
    });

    it('should sort request headers by name', () => {
        const value = new HxLocation('/a')
            .headers(new Map([['X-B', '2'], ['X-A', '1']]))
            .header('X-C', '3')
            .toHeaderValue();

        expect(value).toBe('{"path":"/a","headers":{"X-A":"1","X-B":"2","X-C":"3"}}');
    });

    it('should encode disabled push as false', () => {
        expect(new HxLocation('/a').disablePush().toHeaderValue()).toBe('{"path":"/a","push":false}');
    });

    it('should leave the builder untouched when values cannot be encoded', () => {
        const location = new HxLocation('/a').values({ page: 1 });
        const cyclic: { self?: object } = {};
        cyclic.self = cyclic;

        expect(() => location.values(cyclic)).toThrow(PayloadSerializationError);
        expect(location.toHeaderValue()).toBe('{"path":"/a","values":{"page":1}}');
    });

    it('should reject non-finite numbers inside values', () => {
        const location = new HxLocation('/x');

        expect(() => location.values([Infinity])).toThrow(PayloadSerializationError);
        expect(location.toHeaderValue()).toBe('/x');
    });

    it('should escape characters outside ASCII in the JSON form', () => {
        const value = new HxLocation('/menu').target('#caf\u00e9').values({ drink: '\u2615' }).toHeaderValue();

        expect(value).toBe('{"path":"/menu","target":"#caf\\u00e9","values":{"drink":"\\u2615"}}');
        expect(JSON.parse(value)).toEqual({ path: '/menu', target: '#caf\u00e9', values: { drink: '\u2615' } });
    });
});
