import { JsonValue, toJsonValue } from './JsonValue';
import { PayloadSerializationError } from './errors';

/**
 * TriggerPayload - Data attached to a triggered client-side event.
 *
 * The value is encoded when the payload is built, so an unencodable value
 * fails here and never reaches the trigger registry.
 *
 * ```typescript
 * htmx.triggerEvent('todo-added', TriggerPayload.json({ id: 7, title: 'milk' }));
 * htmx.triggerEvent('flash', TriggerPayload.text('Saved'));
 * ```
 */
export class TriggerPayload {
    private readonly value: JsonValue;

    private constructor(value: JsonValue) {
        this.value = value;
    }

    /**
     * Any JSON-encodable value: objects, arrays, class instances with toJSON()...
     * @throws PayloadSerializationError
     */
    static json(value: unknown): TriggerPayload {
        return new TriggerPayload(toJsonValue(value));
    }

    static text(value: string): TriggerPayload {
        return new TriggerPayload(value);
    }

    static boolean(value: boolean): TriggerPayload {
        return new TriggerPayload(value);
    }

    /**
     * @throws PayloadSerializationError for NaN and infinities
     */
    static number(value: number): TriggerPayload {
        if (!Number.isFinite(value)) {
            throw new PayloadSerializationError(`Cannot encode non-finite number ${String(value)} as JSON`);
        }
        return new TriggerPayload(value);
    }

    asJsonValue(): JsonValue {
        return this.value;
    }

    toJSON(): JsonValue {
        return this.value;
    }
}
