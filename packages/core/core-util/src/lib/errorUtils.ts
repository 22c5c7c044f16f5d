/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in hxwire follows the same shape:
 * ```typescript
 * try {
 *     riskyOperation();
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     // log, wrap or rethrow error
 * }
 * ```
 */

/**
 * Converts whatever was thrown into an Error instance.
 *
 * - Error instances (and subclasses) are returned as-is.
 * - Objects carrying a `message` become an Error keeping that message,
 *   plus `name` and `stack` when they are strings.
 * - Other objects are stringified into the message.
 * - Primitives, null and undefined are described in the message.
 *
 * @example
 * ```typescript
 * try {
 *     JSON.stringify(payload);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     throw new PayloadSerializationError(error.message, error);
 * }
 * ```
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if ('message' in err) {
            const error = new Error(String(err.message));

            if ('stack' in err && typeof err.stack === 'string') {
                error.stack = err.stack;
            }
            if ('name' in err && typeof err.name === 'string') {
                error.name = err.name;
            }

            return error;
        }

        return new Error(`Non-Error object thrown: ${describeObject(err)}`);
    }

    const message = err == null ? 'Null or undefined thrown' : String(err);
    return new Error(message);
}

/**
 * Shorthand for `toError(err).message`, for log lines.
 */
export function errorMessage(err: unknown): string {
    return toError(err).message;
}

function describeObject(obj: object): string {
    try {
        return JSON.stringify(obj);
    } catch (err: unknown) {
        //const error = toError(err);
        // toError() would land back here for the same object
        return '(unable to stringify)';
    }
}
