import { HtmxHeader } from './HtmxHeader';
import { HtmxResponseHeaders } from './HtmxHeaders';

/**
 * When the client fires a triggered event.
 */
export enum TriggerStage {
    /** As soon as the response is received. */
    STANDARD = 'standard',
    /** After the new content has been swapped in. */
    AFTER_SWAP = 'afterSwap',
    /** After the settle step. */
    AFTER_SETTLE = 'afterSettle',
}

const STAGE_HEADERS: ReadonlyMap<TriggerStage, HtmxHeader> = new Map([
    [TriggerStage.STANDARD, HtmxResponseHeaders.TRIGGER],
    [TriggerStage.AFTER_SWAP, HtmxResponseHeaders.TRIGGER_AFTER_SWAP],
    [TriggerStage.AFTER_SETTLE, HtmxResponseHeaders.TRIGGER_AFTER_SETTLE],
]);

/**
 * Stages in the order their headers are flushed.
 */
export const TRIGGER_STAGES: readonly TriggerStage[] = [
    TriggerStage.STANDARD,
    TriggerStage.AFTER_SWAP,
    TriggerStage.AFTER_SETTLE,
];

/**
 * The response header carrying the events of one stage.
 */
export function headerForStage(stage: TriggerStage): HtmxHeader {
    const header = STAGE_HEADERS.get(stage);
    if (!header) {
        throw new Error(`Unknown trigger stage: ${String(stage)}`);
    }
    return header;
}
