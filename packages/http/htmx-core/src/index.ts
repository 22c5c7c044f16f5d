/**
 * @hxwire/htmx-core
 *
 * The per-request HtmxContext and the pieces it is built from.
 */

export { HtmxContext } from './HtmxContext';
export { HeaderReader, MapHeaderReader, RawHeaders, toHeaderMap } from './HeaderReader';
export { RequestSnapshot, RequestSnapshotFields } from './RequestSnapshot';
export { OutgoingDirectives } from './OutgoingDirectives';
export { TriggerEntry, TriggerRegistry } from './TriggerRegistry';
