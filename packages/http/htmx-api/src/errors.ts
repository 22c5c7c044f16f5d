/**
 * Errors raised by the htmx layer.
 *
 * Only payload encoding and trigger naming can fail; every other directive is
 * a plain in-memory write. Failures surface at the call that caused them, so a
 * caller can drop the trigger or abort the request before anything is queued.
 */

/**
 * HtmxError - Base class for all htmx layer errors.
 */
export class HtmxError extends Error {
    public readonly htmxCause?: Error;

    constructor(message: string, cause?: Error) {
        super(message);
        this.name = 'HtmxError';
        this.htmxCause = cause;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * PayloadSerializationError - A trigger payload or HX-Location values
 * object has no JSON encoding (circular, BigInt, function, non-finite number...).
 */
export class PayloadSerializationError extends HtmxError {
    constructor(message: string, cause?: Error) {
        super(message, cause);
        this.name = 'PayloadSerializationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * InvalidTriggerNameError - triggerEvent() was called with an empty name.
 */
export class InvalidTriggerNameError extends HtmxError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidTriggerNameError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ContextNotActiveError - The htmx context was requested outside a request
 * handled by HtmxFilter.
 */
export class ContextNotActiveError extends HtmxError {
    constructor(message: string) {
        super(message);
        this.name = 'ContextNotActiveError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
