import { BlobServiceClient, type BlockBlobParallelUploadOptions } from "@azure/storage-blob";

import type { BlobArchiveConfig } from "../shared/config";
import { persistenceError } from "../shared/errors";
import { sanitizeFileName } from "../shared/csv";
import type { ArchiveStore } from "./store";

// The parts of ContainerClient / BlockBlobClient the store uses.
export interface BlobHandle {
	exists(): Promise<boolean>;
	downloadToBuffer(): Promise<Buffer>;
	uploadData(data: Buffer, options?: BlockBlobParallelUploadOptions): Promise<unknown>;
}

export interface BlobContainer {
	readonly containerName: string;
	createIfNotExists(): Promise<unknown>;
	getBlockBlobClient(blobName: string): BlobHandle;
}

export class BlobArchiveStore implements ArchiveStore {
	public readonly describe: string;
	private ready: Promise<unknown> | null = null;

	constructor(
		private readonly container: BlobContainer,
		private readonly prefix: string
	) {
		this.describe = `blob:${container.containerName}/${prefix}`;
	}

	private blobName(name: string): string {
		const file = sanitizeFileName(name);
		return this.prefix ? `${this.prefix}/${file}` : file;
	}

	private async blob(name: string): Promise<BlobHandle> {
		if (!this.ready) {
			this.ready = this.container.createIfNotExists().catch((err: unknown) => {
				this.ready = null;
				throw err;
			});
		}
		await this.ready;
		return this.container.getBlockBlobClient(this.blobName(name));
	}

	async find(name: string): Promise<boolean> {
		try {
			return await (await this.blob(name)).exists();
		} catch (err) {
			throw persistenceError(`Could not look up blob ${this.blobName(name)}`, { store: this.describe }, err);
		}
	}

	async read(name: string): Promise<string | undefined> {
		try {
			const blob = await this.blob(name);
			if (!(await blob.exists())) return undefined;
			return (await blob.downloadToBuffer()).toString("utf8");
		} catch (err) {
			throw persistenceError(`Could not download blob ${this.blobName(name)}`, { store: this.describe }, err);
		}
	}

	async write(name: string, content: string): Promise<void> {
		try {
			const blob = await this.blob(name);
			await blob.uploadData(Buffer.from(content, "utf8"), {
				blobHTTPHeaders: { blobContentType: "text/csv; charset=utf-8" }
			});
		} catch (err) {
			throw persistenceError(`Could not upload blob ${this.blobName(name)}`, { store: this.describe }, err);
		}
	}
}

export function createBlobArchiveStore(cfg: BlobArchiveConfig): BlobArchiveStore {
	const svc = BlobServiceClient.fromConnectionString(cfg.connectionString);
	return new BlobArchiveStore(svc.getContainerClient(cfg.container), cfg.prefix);
}
