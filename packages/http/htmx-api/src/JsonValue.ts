import { toError } from '@hxwire/core-util';
import { PayloadSerializationError } from './errors';

/**
 * A value that survives JSON encoding unchanged.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Encode any value into its JSON form, the way JSON.stringify sees it:
 * toJSON() is honoured, undefined members are dropped, Dates become strings.
 *
 * Throws PayloadSerializationError when there is no JSON form at all.
 */
export function toJsonValue(value: unknown): JsonValue {
    let encoded: string | undefined;
    try {
        encoded = JSON.stringify(value, rejectNonFinite);
    } catch (err: unknown) {
        if (err instanceof PayloadSerializationError) {
            throw err;
        }
        const error = toError(err);
        throw new PayloadSerializationError(`Cannot encode value as JSON: ${error.message}`, error);
    }

    if (encoded === undefined) {
        throw new PayloadSerializationError(`Cannot encode value of type ${typeof value} as JSON`);
    }

    const decoded: JsonValue = JSON.parse(encoded);
    return decoded;
}

/**
 * Write every character outside printable ASCII as a \uXXXX escape, so JSON
 * text stays a valid HTTP header value without changing what it decodes to.
 */
export function escapeNonAscii(json: string): string {
    return json.replace(/[\u007f-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

// JSON.stringify turns NaN and the infinities into null, at any depth
function rejectNonFinite(key: string, member: unknown): unknown {
    if (typeof member === 'number' && !Number.isFinite(member)) {
        const where = key === '' ? '' : ` at "${key}"`;
        throw new PayloadSerializationError(`Cannot encode non-finite number ${String(member)}${where} as JSON`);
    }
    return member;
}
