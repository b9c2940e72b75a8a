/**
 * RecordLog - ordered, append-only record shared between the emulator and its caller.
 *
 * The emulator appends from its socket handlers; the caller reads with snapshot()
 * and resets with clear(). snapshot() always returns a copy, so a caller never holds
 * a view that changes underneath it. Appends happen before the matching reply is
 * written, so once the peer has seen a reply its record is already visible here.
 */

import { EventEmitter } from 'events';

export class RecordLog<T> {
    private entries: T[] = [];
    private readonly events = new EventEmitter();

    append(entry: T): void {
        this.entries.push(entry);
        this.events.emit('append', this.entries.length);
    }

    /** Copy of the entries in append order */
    snapshot(): T[] {
        return [...this.entries];
    }

    clear(): void {
        this.entries = [];
    }

    get length(): number {
        return this.entries.length;
    }

    /**
     * Resolve once the log holds at least `count` entries.
     * There is no timeout; callers that need one race this promise against their own timer.
     */
    waitForLength(count: number): Promise<T[]> {
        if (this.entries.length >= count) {
            return Promise.resolve(this.snapshot());
        }
        return new Promise((resolve) => {
            const onAppend = (length: number) => {
                if (length >= count) {
                    this.events.off('append', onAppend);
                    resolve(this.snapshot());
                }
            };
            this.events.on('append', onAppend);
        });
    }
}
