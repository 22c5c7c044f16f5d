import { InvalidTriggerNameError, JsonValue, TriggerPayload, TriggerStage, escapeNonAscii } from '@hxwire/htmx-api';

/**
 * One triggered event: unique per (stage, name) within a request.
 */
export class TriggerEntry {
    constructor(
        public readonly stage: TriggerStage,
        public readonly name: string,
        public readonly payload?: TriggerPayload,
    ) {}
}

/**
 * TriggerRegistry - Ordered, append-only record of the events to fire on the
 * client, grouped by lifecycle stage.
 *
 * Triggering a name again in the same stage replaces its payload and keeps
 * the position of the first call, so serialization order is the order in
 * which distinct events were first triggered.
 */
export class TriggerRegistry {
    private readonly stages = new Map<TriggerStage, Map<string, TriggerEntry>>();

    /**
     * @throws InvalidTriggerNameError when name is empty; nothing is recorded
     */
    add(name: string, payload: TriggerPayload | undefined, stage: TriggerStage): void {
        if (name.length === 0) {
            throw new InvalidTriggerNameError(`Trigger event name must not be empty (stage ${stage})`);
        }

        let entries = this.stages.get(stage);
        if (!entries) {
            entries = new Map();
            this.stages.set(stage, entries);
        }
        // Map.set on an existing key keeps its original position
        entries.set(name, new TriggerEntry(stage, name, payload));
    }

    entries(stage: TriggerStage): TriggerEntry[] {
        return [...(this.stages.get(stage)?.values() ?? [])];
    }

    isEmpty(stage: TriggerStage): boolean {
        return (this.stages.get(stage)?.size ?? 0) === 0;
    }

    /**
     * Header value for one stage, or undefined when nothing was triggered.
     *
     * A single event without payload is sent as its bare name. Anything else
     * is a JSON object of event name -> payload, null standing in for a
     * missing payload, with non-ASCII characters escaped.
     */
    serialize(stage: TriggerStage): string | undefined {
        const entries = this.entries(stage);
        if (entries.length === 0) {
            return undefined;
        }

        const [first] = entries;
        if (entries.length === 1 && first.payload === undefined) {
            return first.name;
        }

        const body = Object.fromEntries(
            entries.map((entry): [string, JsonValue] => [entry.name, entry.payload?.asJsonValue() ?? null]),
        );
        return escapeNonAscii(JSON.stringify(body));
    }
}
