/**
 * Journal: optional persistence for committed ledger events.
 *
 * The ledger hands every committed event to `record()` in sequence order.
 * Writes are asynchronous and never block or undo a committed operation.
 */

import type { LedgerEvent } from "../events/ledger-events.js";

export interface Journal {
	record(event: LedgerEvent): Promise<void>;
	flush(): Promise<void>;
}
