/**
 * MemoryJournal: in-memory, append-only event journal.
 *
 * Used by tests and short-lived ledgers. Not persisted across restarts.
 */

import type { LedgerEvent, LedgerEventType } from "../events/ledger-events.js";
import type { Journal } from "./journal.js";

export interface MemoryJournalConfig {
	readonly maxEntries?: number;
}

export class MemoryJournal implements Journal {
	private readonly store: LedgerEvent[] = [];
	private readonly maxEntries: number;

	constructor(config?: MemoryJournalConfig) {
		this.maxEntries = config?.maxEntries ?? Number.POSITIVE_INFINITY;
	}

	/**
	 * Appends an event, dropping the oldest once `maxEntries` is exceeded.
	 * @param event - The committed event to record
	 */
	async record(event: LedgerEvent): Promise<void> {
		this.store.push(event);
		const excess = this.store.length - this.maxEntries;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Returns a shallow copy of all recorded events. */
	entries(): LedgerEvent[] {
		return [...this.store];
	}

	/** Recorded events of one type, in sequence order. */
	entriesOf(type: LedgerEventType): LedgerEvent[] {
		return this.store.filter((event) => event.type === type);
	}

	clear(): void {
		this.store.length = 0;
	}

	/** No-op: writes are synchronous. */
	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}
