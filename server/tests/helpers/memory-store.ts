import { persistenceError } from "../../src/shared/errors";
import type { ArchiveStore } from "../../src/archive/store";

export class MemoryArchiveStore implements ArchiveStore {
	public readonly describe = "memory";
	public readonly files = new Map<string, string>();
	public readonly writes: string[] = [];
	/** Names whose write rejects. */
	public readonly failWrites = new Set<string>();
	/** Names whose read rejects. */
	public readonly failReads = new Set<string>();

	async find(name: string): Promise<boolean> {
		return this.files.has(name);
	}

	async read(name: string): Promise<string | undefined> {
		if (this.failReads.has(name)) throw persistenceError(`unreachable: ${name}`);
		return this.files.get(name);
	}

	async write(name: string, content: string): Promise<void> {
		this.writes.push(name);
		if (this.failWrites.has(name)) throw persistenceError(`disk full: ${name}`);
		this.files.set(name, content);
	}
}
