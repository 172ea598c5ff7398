import { GenerationAbortedError, ResourceBusyError } from "./provider.js";

export interface AdmissionGateOptions {
	maxConcurrency?: number;
	maxQueue?: number;
	queueTimeoutMs?: number;
}

export type ReleaseSlot = () => void;

interface Waiter {
	grant(release: ReleaseSlot): void;
	reject(error: Error): void;
}

const DEFAULT_QUEUE_TIMEOUT_MS = 30_000;

/**
 * Bounded admission for a resource that can only serve a few generations at
 * once. Callers either get a slot, wait in a bounded FIFO queue, or receive a
 * ResourceBusyError.
 */
export class AdmissionGate {
	private readonly maxConcurrency: number;
	private readonly maxQueue: number;
	private readonly queueTimeoutMs: number;
	private active = 0;
	private readonly waiters: Waiter[] = [];

	constructor(options: AdmissionGateOptions = {}) {
		this.maxConcurrency = Math.max(1, Math.floor(options.maxConcurrency ?? 1));
		this.maxQueue = Math.max(0, Math.floor(options.maxQueue ?? 0));
		this.queueTimeoutMs = options.queueTimeoutMs ?? DEFAULT_QUEUE_TIMEOUT_MS;
	}

	get activeCount(): number {
		return this.active;
	}

	get queuedCount(): number {
		return this.waiters.length;
	}

	acquire(signal?: AbortSignal): Promise<ReleaseSlot> {
		if (signal?.aborted) {
			return Promise.reject(new GenerationAbortedError());
		}

		if (this.active < this.maxConcurrency) {
			this.active += 1;
			return Promise.resolve(this.createRelease());
		}

		if (this.waiters.length >= this.maxQueue) {
			return Promise.reject(new ResourceBusyError("Local model is busy with another request"));
		}

		return new Promise<ReleaseSlot>((resolve, reject) => {
			const cleanup = () => {
				clearTimeout(timeoutId);
				signal?.removeEventListener("abort", onAbort);
				const index = this.waiters.indexOf(waiter);
				if (index !== -1) {
					this.waiters.splice(index, 1);
				}
			};

			const waiter: Waiter = {
				grant: (release) => {
					cleanup();
					resolve(release);
				},
				reject: (error) => {
					cleanup();
					reject(error);
				}
			};

			const onAbort = () => waiter.reject(new GenerationAbortedError());
			const timeoutId = setTimeout(() => {
				waiter.reject(new ResourceBusyError("Timed out waiting for the local model"));
			}, this.queueTimeoutMs);

			signal?.addEventListener("abort", onAbort, { once: true });
			this.waiters.push(waiter);
		});
	}

	private createRelease(): ReleaseSlot {
		let released = false;
		return () => {
			if (released) {
				return;
			}
			released = true;

			const next = this.waiters[0];
			if (next) {
				// The slot passes straight to the next waiter.
				next.grant(this.createRelease());
				return;
			}
			this.active -= 1;
		};
	}
}
