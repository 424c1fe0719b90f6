import { EventEmitter } from "eventemitter3";

/**
 * Event map -- keys are event names, values are handler signatures.
 * Example: { committed: (event: LedgerEvent) => void }
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * @example
 * ```ts
 * type Events = { committed: (seq: bigint) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("committed", (seq) => console.log(seq));
 * emitter.emit("committed", 1n);
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/** Registers a handler that auto-removes after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return this;
	}

	/**
	 * Invokes every handler registered for `event`, in registration order.
	 * @returns true if at least one handler was registered
	 */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): this {
		this.ee.removeAllListeners();
		return this;
	}
}
