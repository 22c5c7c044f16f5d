/**
 * @hxwire/core-util
 *
 * Utility functions shared by every hxwire package.
 * Nothing here depends on Node.js-only APIs.
 *
 * @packageDocumentation
 */

export { toError, errorMessage } from './lib/errorUtils';
