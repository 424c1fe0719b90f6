import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	committed: (sequence: number) => void;
	failed: (err: Error) => void;
	ping: () => void;
};

describe("TypedEmitter", () => {
	it("emit() triggers registered on() handler with correct args", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("committed", handler);
		emitter.emit("committed", 7);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith(7);
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("committed", handler);
		emitter.off("committed", handler);
		emitter.emit("committed", 1);

		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires handler exactly once", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("committed", handler);
		emitter.emit("committed", 10);
		emitter.emit("committed", 20);

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith(10);
	});

	it("calls listeners in registration order", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const order: string[] = [];

		emitter.on("ping", () => order.push("first"));
		emitter.on("ping", () => order.push("second"));
		emitter.on("ping", () => order.push("third"));
		emitter.emit("ping");

		expect(order).toEqual(["first", "second", "third"]);
	});

	it("emit returns false when no listeners", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("committed", 0)).toBe(false);
	});

	it("listenerCount() returns correct count", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const h1 = vi.fn();
		const h2 = vi.fn();

		expect(emitter.listenerCount("committed")).toBe(0);
		emitter.on("committed", h1).on("committed", h2);
		expect(emitter.listenerCount("committed")).toBe(2);
		emitter.off("committed", h2);
		expect(emitter.listenerCount("committed")).toBe(1);
	});

	it("removeAllListeners() clears all events", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const committedHandler = vi.fn();
		const failedHandler = vi.fn();

		emitter.on("committed", committedHandler);
		emitter.on("failed", failedHandler);
		emitter.removeAllListeners();
		emitter.emit("committed", 1);
		emitter.emit("failed", new Error("boom"));

		expect(committedHandler).not.toHaveBeenCalled();
		expect(failedHandler).not.toHaveBeenCalled();
	});

	it("on/off/once return this for chaining", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		const result = emitter.on("committed", handler).once("ping", handler).off("committed", handler);

		expect(result).toBe(emitter);
	});
});
