/**
 * @hxwire/htmx-api
 *
 * The htmx wire contract: header names, swap types, trigger stages,
 * trigger payloads and the HX-Location builder.
 *
 * Architecture:
 * ```
 * htmx-api (wire contract)
 *    ↑
 * htmx-core (per-request HtmxContext)
 *    ↑
 * htmx-server (filter + Express adapter)
 * ```
 */

export { HtmxHeader } from './HtmxHeader';
export { HtmxRequestHeaders, HtmxResponseHeaders, TRUE_TOKEN } from './HtmxHeaders';
export { SwapType, parseSwapType } from './SwapType';
export { TriggerStage, TRIGGER_STAGES, headerForStage } from './TriggerStage';
export { JsonValue, escapeNonAscii, toJsonValue } from './JsonValue';
export { TriggerPayload } from './TriggerPayload';
export { HxLocation, HxLocationBody } from './HxLocation';
export {
    HtmxError,
    PayloadSerializationError,
    InvalidTriggerNameError,
    ContextNotActiveError,
} from './errors';
