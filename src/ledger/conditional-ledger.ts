/**
 * ConditionalLedger: composition root wiring the condition registry,
 * oracle intake, position ledger and transfer layer over one LedgerState.
 *
 * Every ledger is an isolated object: two ledgers never share balances,
 * conditions or subscribers.
 */

import { CollateralRegistry } from "../collateral/collateral-registry.js";
import { ConditionRegistry } from "../conditions/condition-registry.js";
import { OracleIntake } from "../conditions/oracle-intake.js";
import {
	type LedgerEvent,
	type LedgerEventOf,
	type LedgerEventType,
	isEventOf,
} from "../events/ledger-events.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { FileJournal } from "../persistence/file-journal.js";
import type { Journal } from "../persistence/journal.js";
import { PositionLedger } from "../position/position-ledger.js";
import { type LedgerConfig, resolveConfig } from "../shared/config.js";
import { classifyError, type LedgerError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { LedgerState } from "../state/ledger-state.js";
import { MultiAssetToken } from "../token/multi-asset-token.js";

export interface ConditionalLedgerOptions {
	readonly config?: Partial<LedgerConfig>;
	readonly clock?: Clock;
	/** Defaults to a pino logger at `config.logLevel` */
	readonly logger?: Logger;
	/** Defaults to a FileJournal when `config.journalPath` is set, otherwise none */
	readonly journal?: Journal;
	readonly collateral?: CollateralRegistry;
}

export type Unsubscribe = () => void;

type LedgerEmitterEvents = {
	committed: (event: LedgerEvent) => void;
};

const MAX_KEPT_JOURNAL_ERRORS = 10;

export class ConditionalLedger {
	readonly config: LedgerConfig;
	readonly conditions: ConditionRegistry;
	readonly oracle: OracleIntake;
	readonly positions: PositionLedger;
	readonly assets: MultiAssetToken;
	readonly collateral: CollateralRegistry;

	private readonly state: LedgerState;
	private readonly logger: Logger;
	private readonly journal: Journal | null;
	private readonly emitter = new TypedEmitter<LedgerEmitterEvents>();
	private journalQueue: Promise<void> = Promise.resolve();
	private readonly undelivered: LedgerEvent[] = [];
	private delivering = false;
	private readonly _journalErrors: LedgerError[] = [];

	private constructor(options: ConditionalLedgerOptions) {
		this.config = resolveConfig(options.config);
		this.logger = (
			options.logger ?? createLogger({ level: this.config.logLevel })
		).child({ component: "conditional-ledger" });
		this.journal = options.journal ?? defaultJournal(this.config);
		this.collateral = options.collateral ?? new CollateralRegistry();

		this.state = new LedgerState({
			logger: this.logger,
			onCommit: (events) => this.publish(events),
			...(options.clock !== undefined && { clock: options.clock }),
		});
		this.conditions = new ConditionRegistry(this.state);
		this.oracle = new OracleIntake(this.state);
		this.positions = new PositionLedger({
			state: this.state,
			conditions: this.conditions,
			collateral: this.collateral,
			custody: this.config.custodyAddress,
		});
		this.assets = new MultiAssetToken(this.state);
	}

	/**
	 * Builds a ledger from defaults overlaid with `options.config`.
	 *
	 * @example
	 * ```ts
	 * const ledger = ConditionalLedger.create({
	 *   config: configFromEnv(),
	 *   collateral: new CollateralRegistry().register(usdc, token),
	 * });
	 * ```
	 */
	static create(options: ConditionalLedgerOptions = {}): ConditionalLedger {
		return new ConditionalLedger(options);
	}

	// ── Subscriptions ────────────────────────────────────────────────

	/** Subscribes to committed events of one type. */
	on<K extends LedgerEventType>(type: K, handler: (event: LedgerEventOf<K>) => void): Unsubscribe {
		return this.subscribe((event) => {
			if (isEventOf(event, type)) handler(event);
		});
	}

	/** Subscribes to every committed event, in sequence order. */
	onAny(handler: (event: LedgerEvent) => void): Unsubscribe {
		return this.subscribe(handler);
	}

	// ── Journal ──────────────────────────────────────────────────────

	/** Waits until every committed event has been handed to the journal and flushed. */
	async flush(): Promise<void> {
		await this.journalQueue;
		await this.journal?.flush();
	}

	/** The most recent journal write failures, oldest first. */
	journalErrors(): readonly LedgerError[] {
		return this._journalErrors;
	}

	/** Sequence number of the last committed event. */
	get lastSequence(): number {
		return this.state.lastSequence;
	}

	// ── Internal ─────────────────────────────────────────────────────

	private subscribe(listener: (event: LedgerEvent) => void): Unsubscribe {
		const guarded = (event: LedgerEvent): void => {
			try {
				listener(event);
			} catch (error: unknown) {
				this.logger.error(
					{ sequence: event.sequence, type: event.type, err: classifyError(error).toJSON() },
					"event handler threw",
				);
			}
		};
		this.emitter.on("committed", guarded);
		return () => {
			this.emitter.off("committed", guarded);
		};
	}

	/**
	 * Journals a committed batch, then delivers it. A handler that runs another
	 * operation commits a later batch; that batch joins the queue behind the
	 * one being delivered, so handlers always see sequence order.
	 */
	private publish(events: readonly LedgerEvent[]): void {
		for (const event of events) {
			this.enqueue(event);
		}
		this.undelivered.push(...events);
		if (this.delivering) return;

		this.delivering = true;
		try {
			let event = this.undelivered.shift();
			while (event !== undefined) {
				this.emitter.emit("committed", event);
				event = this.undelivered.shift();
			}
		} finally {
			this.delivering = false;
		}
	}

	private enqueue(event: LedgerEvent): void {
		const journal = this.journal;
		if (journal === null) return;
		this.journalQueue = this.journalQueue
			.then(() => journal.record(event))
			.catch((error: unknown) => {
				const failure = classifyError(error);
				this._journalErrors.push(failure);
				if (this._journalErrors.length > MAX_KEPT_JOURNAL_ERRORS) {
					this._journalErrors.shift();
				}
				this.logger.error(
					{ sequence: event.sequence, type: event.type, err: failure.toJSON() },
					"journal write failed",
				);
			});
	}
}

function defaultJournal(config: LedgerConfig): Journal | null {
	if (config.journalPath === undefined) return null;
	return FileJournal.create({
		filePath: config.journalPath,
		maxFileSizeBytes: config.journalMaxFileSizeBytes,
	});
}
