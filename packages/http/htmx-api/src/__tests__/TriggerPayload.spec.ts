import { TriggerPayload } from '../TriggerPayload';
import { PayloadSerializationError, HtmxError } from '../errors';

describe('TriggerPayload', () => {
    it('should hold text, booleans and numbers as-is', () => {
        expect(TriggerPayload.text('{not: "json"').asJsonValue()).toBe('{not: "json"');
        expect(TriggerPayload.boolean(false).asJsonValue()).toBe(false);
        expect(TriggerPayload.number(2.5).asJsonValue()).toBe(2.5);
    });

    it('should encode objects the way JSON.stringify does', () => {
        const payload = TriggerPayload.json({
            id: 1,
            complete: false,
            dropped: undefined,
            due: new Date(Date.UTC(2024, 0, 2)),
        });

        expect(payload.asJsonValue()).toEqual({
            id: 1,
            complete: false,
            due: '2024-01-02T00:00:00.000Z',
        });
    });

    it('should honour toJSON()', () => {
        class Todo {
            constructor(private readonly title: string) {}

            toJSON(): { title: string } {
                return { title: this.title.toUpperCase() };
            }
        }

        expect(TriggerPayload.json(new Todo('milk')).asJsonValue()).toEqual({ title: 'MILK' });
    });

    it('should serialize to its value inside JSON.stringify', () => {
        const payload = TriggerPayload.json({ level: 'info' });

        expect(JSON.stringify({ flash: payload })).toBe('{"flash":{"level":"info"}}');
    });

    it('should reject circular structures', () => {
        const node: { name: string; parent?: object } = { name: 'loop' };
        node.parent = node;

        expect(() => TriggerPayload.json(node)).toThrow(PayloadSerializationError);
    });

    it('should reject BigInt with the cause attached', () => {
        let caught: unknown;
        try {
            TriggerPayload.json({ count: BigInt(1) });
        } catch (err: unknown) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(PayloadSerializationError);
        expect(caught).toBeInstanceOf(HtmxError);
        const error = caught instanceof PayloadSerializationError ? caught : undefined;
        expect(error?.name).toBe('PayloadSerializationError');
        expect(error?.htmxCause).toBeInstanceOf(TypeError);
    });

    it('should reject values without a JSON form', () => {
        expect(() => TriggerPayload.json(undefined)).toThrow('Cannot encode value of type undefined as JSON');
        expect(() => TriggerPayload.json(() => 1)).toThrow('Cannot encode value of type function as JSON');
    });

    it('should reject non-finite numbers', () => {
        expect(() => TriggerPayload.number(Number.NaN)).toThrow('Cannot encode non-finite number NaN as JSON');
        expect(() => TriggerPayload.json(Infinity)).toThrow(PayloadSerializationError);
    });

    it('should reject non-finite numbers nested in objects and arrays', () => {
        expect(() => TriggerPayload.json({ count: Number.NaN })).toThrow(
            'Cannot encode non-finite number NaN at "count" as JSON',
        );
        expect(() => TriggerPayload.json({ stats: { ratios: [1, -Infinity] } })).toThrow(
            'Cannot encode non-finite number -Infinity at "1" as JSON',
        );
    });
});
