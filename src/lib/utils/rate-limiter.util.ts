/**
 * Enforces a minimum gap between the starts of consecutive operations.
 *
 * Slots are reserved synchronously when `acquire` is called, so concurrent callers are
 * spaced out globally rather than each sleeping independently. A caller that aborts
 * while waiting gives up its turn but not its slot: later callers keep their spacing.
 */
export class RateLimiter {
	private nextSlot = Number.NEGATIVE_INFINITY;

	constructor(
		readonly minIntervalMs: number,
		private readonly now: () => number = () => Date.now(),
	) {}

	async acquire(signal?: AbortSignal): Promise<void> {
		signal?.throwIfAborted();

		const current = this.now();
		const slot = Math.max(current, this.nextSlot);
		this.nextSlot = slot + this.minIntervalMs;

		const wait = slot - current;
		if (wait > 0) {
			await this.sleep(wait, signal);
		}
	}

	private sleep(ms: number, signal?: AbortSignal): Promise<void> {
		return new Promise((resolve, reject) => {
			const onAbort = () => {
				clearTimeout(timer);
				reject(signal?.reason);
			};
			const timer = setTimeout(() => {
				signal?.removeEventListener('abort', onAbort);
				resolve();
			}, ms);
			signal?.addEventListener('abort', onAbort, { once: true });
		});
	}
}
