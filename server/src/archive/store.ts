import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import { persistenceError } from "../shared/errors";
import { sanitizeFileName } from "../shared/csv";
import type { Logger } from "../shared/log";
import { csvToRowSet, rowSetToCsv } from "./csv";
import { mergeRowSets } from "./merge";

/**
 * Where archive files live. One file per sensor, always rewritten whole.
 */
export interface ArchiveStore {
	readonly describe: string;
	find(name: string): Promise<boolean>;
	/** undefined when there is no such file yet. */
	read(name: string): Promise<string | undefined>;
	/** Create or replace. */
	write(name: string, content: string): Promise<void>;
}

function isMissing(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class LocalArchiveStore implements ArchiveStore {
	public readonly describe: string;

	constructor(private readonly dir: string) {
		this.describe = `local:${dir}`;
	}

	private fileFor(name: string): string {
		return path.join(this.dir, sanitizeFileName(name));
	}

	async find(name: string): Promise<boolean> {
		try {
			await fs.stat(this.fileFor(name));
			return true;
		} catch (err) {
			if (isMissing(err)) return false;
			throw persistenceError(`Could not stat archive ${name}`, { store: this.describe }, err);
		}
	}

	async read(name: string): Promise<string | undefined> {
		try {
			return await fs.readFile(this.fileFor(name), "utf8");
		} catch (err) {
			if (isMissing(err)) return undefined;
			throw persistenceError(`Could not read archive ${name}`, { store: this.describe }, err);
		}
	}

	async write(name: string, content: string): Promise<void> {
		const file = this.fileFor(name);
		const tmp = `${file}.tmp-${randomUUID()}`;
		try {
			await fs.mkdir(this.dir, { recursive: true });
			await fs.writeFile(tmp, content, "utf8");
			await fs.rename(tmp, file);
		} catch (err) {
			await fs.rm(tmp, { force: true });
			throw persistenceError(`Could not write archive ${name}`, { store: this.describe }, err);
		}
	}
}

/** Combines the remote and local copies of one file; remote rows come first. */
export type ArchiveReconciler = (remote: string, local: string) => string;

function mergeCopies(remote: string, local: string): string {
	return rowSetToCsv(mergeRowSets(csvToRowSet(remote), csvToRowSet(local)));
}

/**
 * Remote store backed by a local one. Writes go to the local copy first, so
 * a failed upload leaves its rows on disk; reads merge both copies so those
 * rows come back on the next cycle. A remote failure is an error, never a
 * silent switch to the local copy alone.
 */
export class LayeredArchiveStore implements ArchiveStore {
	public readonly describe: string;

	constructor(
		private readonly primary: ArchiveStore,
		private readonly fallback: ArchiveStore,
		private readonly log: Logger,
		private readonly reconcile: ArchiveReconciler = mergeCopies
	) {
		this.describe = `${primary.describe} (fallback ${fallback.describe})`;
	}

	async find(name: string): Promise<boolean> {
		let remote: boolean;
		try {
			remote = await this.primary.find(name);
		} catch (err) {
			throw persistenceError(`Could not look up archive ${name}`, { store: this.primary.describe }, err);
		}
		return remote || this.fallback.find(name);
	}

	async read(name: string): Promise<string | undefined> {
		let remote: string | undefined;
		try {
			remote = await this.primary.read(name);
		} catch (err) {
			throw persistenceError(`Could not read archive ${name}`, { store: this.primary.describe }, err);
		}

		const local = await this.fallback.read(name);
		if (remote === undefined) return local;
		if (local === undefined || local === remote) return remote;

		this.log.info(`archive: ${name} differs between ${this.primary.describe} and ${this.fallback.describe}; merging`);
		return this.reconcile(remote, local);
	}

	async write(name: string, content: string): Promise<void> {
		await this.fallback.write(name, content);
		await this.primary.write(name, content);
	}
}
