import { afterEach, describe, expect, it, vi } from "vitest";

import { AdmissionGate } from "../../../src/services/llm/admission-gate.js";
import { GenerationAbortedError, ResourceBusyError } from "../../../src/services/llm/provider.js";

describe("AdmissionGate", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("grants slots up to the concurrency limit", async () => {
		const gate = new AdmissionGate({ maxConcurrency: 2 });

		await gate.acquire();
		await gate.acquire();

		expect(gate.activeCount).toBe(2);
		await expect(gate.acquire()).rejects.toBeInstanceOf(ResourceBusyError);
	});

	it("hands a released slot to the oldest waiter", async () => {
		const gate = new AdmissionGate({ maxConcurrency: 1, maxQueue: 2 });
		const release = await gate.acquire();
		const order: string[] = [];

		const first = gate.acquire().then((next) => {
			order.push("first");
			return next;
		});
		const second = gate.acquire().then((next) => {
			order.push("second");
			return next;
		});
		expect(gate.queuedCount).toBe(2);

		release();
		const releaseFirst = await first;
		expect(order).toEqual(["first"]);
		expect(gate.activeCount).toBe(1);

		releaseFirst();
		const releaseSecond = await second;
		releaseSecond();

		expect(order).toEqual(["first", "second"]);
		expect(gate.activeCount).toBe(0);
		expect(gate.queuedCount).toBe(0);
	});

	it("ignores a second call to the same release", async () => {
		const gate = new AdmissionGate({ maxConcurrency: 1 });
		const release = await gate.acquire();

		release();
		release();

		expect(gate.activeCount).toBe(0);
	});

	it("rejects queued callers after the queue timeout", async () => {
		vi.useFakeTimers();
		const gate = new AdmissionGate({ maxConcurrency: 1, maxQueue: 1, queueTimeoutMs: 1_000 });
		await gate.acquire();

		const waiting = gate.acquire();
		const assertion = expect(waiting).rejects.toThrow("Timed out waiting for the local model");
		await vi.advanceTimersByTimeAsync(1_000);
		await assertion;

		expect(gate.queuedCount).toBe(0);
	});

	it("removes an aborted waiter from the queue", async () => {
		const gate = new AdmissionGate({ maxConcurrency: 1, maxQueue: 1 });
		const release = await gate.acquire();
		const controller = new AbortController();

		const waiting = gate.acquire(controller.signal);
		controller.abort();

		await expect(waiting).rejects.toBeInstanceOf(GenerationAbortedError);
		expect(gate.queuedCount).toBe(0);

		release();
		expect(gate.activeCount).toBe(0);
	});
});
