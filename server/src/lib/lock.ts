/**
 * Serializes async work per key (one archive cycle per sensor at a time).
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const prev = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>(resolve => {
			release = resolve;
		});
		const tail = prev.then(() => current);
		this.tails.set(key, tail);

		await prev;
		try {
			return await fn();
		} finally {
			release();
			if (this.tails.get(key) === tail) this.tails.delete(key);
		}
	}
}
