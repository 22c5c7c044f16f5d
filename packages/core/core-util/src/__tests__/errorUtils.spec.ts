import { toError, errorMessage } from '../lib/errorUtils';

describe('toError', () => {
    describe('Error instances', () => {
        it('should return Error instances unchanged', () => {
            const originalError = new Error('header write failed');
            const result = toError(originalError);

            expect(result).toBe(originalError);
        });

        it('should return custom Error subclasses unchanged', () => {
            class PayloadError extends Error {
                constructor(message: string) {
                    super(message);
                    this.name = 'PayloadError';
                }
            }

            const originalError = new PayloadError('cannot encode');
            const result = toError(originalError);

            expect(result).toBe(originalError);
            expect(result.name).toBe('PayloadError');
        });
    });

    describe('Error-like objects', () => {
        it('should keep message, name and stack', () => {
            const result = toError({
                message: 'Invalid character in header content',
                name: 'TypeError',
                stack: 'TypeError: Invalid character...',
                code: 'ERR_INVALID_CHAR',
            });

            expect(result).toBeInstanceOf(Error);
            expect(result.message).toBe('Invalid character in header content');
            expect(result.name).toBe('TypeError');
            expect(result.stack).toBe('TypeError: Invalid character...');
        });

        it('should ignore non-string name', () => {
            const result = toError({ message: 'boom', name: 42 });

            expect(result.message).toBe('boom');
            expect(result.name).toBe('Error');
        });
    });

    describe('Objects without message', () => {
        it('should stringify plain objects', () => {
            const result = toError({ header: 'HX-Trigger', status: 500 });

            expect(result.message).toBe('Non-Error object thrown: {"header":"HX-Trigger","status":500}');
        });

        it('should survive circular references', () => {
            const obj: { name: string; self?: object } = { name: 'circular' };
            obj.self = obj;

            const result = toError(obj);

            expect(result.message).toBe('Non-Error object thrown: (unable to stringify)');
        });

        it('should describe objects JSON cannot encode without throwing', () => {
            const result = toError({ id: 10n });

            expect(result).toBeInstanceOf(Error);
            expect(result.message).toBe('Non-Error object thrown: (unable to stringify)');
        });
    });

    describe('Primitive values', () => {
        it('should convert strings', () => {
            expect(toError('rejected').message).toBe('rejected');
        });

        it('should convert numbers and booleans', () => {
            expect(toError(404).message).toBe('404');
            expect(toError(false).message).toBe('false');
        });

        it('should describe null and undefined', () => {
            expect(toError(null).message).toBe('Null or undefined thrown');
            expect(toError(undefined).message).toBe('Null or undefined thrown');
        });

        it('should convert symbols and bigints', () => {
            expect(toError(Symbol('trigger')).message).toBe('Symbol(trigger)');
            expect(toError(BigInt(12)).message).toBe('12');
        });
    });
});

describe('errorMessage', () => {
    it('should return the normalised message', () => {
        expect(errorMessage(new Error('flush failed'))).toBe('flush failed');
        expect(errorMessage('plain')).toBe('plain');
    });
});
