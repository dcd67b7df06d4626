import crypto from "node:crypto";
import {
	ArtifactNotFoundError,
	ArtifactNotReadyError,
	ArtifactsDiscardedError,
	DuplicateArtifactError,
} from "./errors.js";

/** Where artifact blobs live. Keys are SHA-256 digests. */
export interface ArtifactTransport {
	write(key: string, payload: Uint8Array): Promise<void>;
	read(key: string): Promise<Uint8Array>;
	delete(key: string): Promise<void>;
}

export class MemoryArtifactTransport implements ArtifactTransport {
	private readonly blobs = new Map<string, Uint8Array>();

	async write(key: string, payload: Uint8Array): Promise<void> {
		this.blobs.set(key, Uint8Array.from(payload));
	}

	async read(key: string): Promise<Uint8Array> {
		const blob = this.blobs.get(key);
		if (!blob) {
			throw new Error(`Missing artifact blob ${key}`);
		}
		return Uint8Array.from(blob);
	}

	async delete(key: string): Promise<void> {
		this.blobs.delete(key);
	}

	get size(): number {
		return this.blobs.size;
	}
}

export type StoredArtifact = {
	jobId: string;
	name: string;
	digest: string;
	size: number;
	fileName?: string;
	storedAt: string;
};

/**
 * Per-run artifact store. Payloads are copied in and out, so a consumer never
 * shares memory with the producer, and only succeeded producers are visible.
 */
export class ArtifactStore {
	private readonly entries: StoredArtifact[] = [];
	private readonly declared = new Map<string, Set<string>>();
	private readonly succeeded = new Map<string, number>();
	private readonly refs = new Map<string, number>();
	private readonly writes = new Map<string, Promise<void>>();
	private discarded = false;

	constructor(
		readonly runId: string,
		private readonly transport: ArtifactTransport = new MemoryArtifactTransport(),
	) {}

	/** Records that `jobId` is expected to produce each of `names`. */
	declare(jobId: string, names: string[]): void {
		for (const name of names) {
			const producers = this.declared.get(name) ?? new Set<string>();
			producers.add(jobId);
			this.declared.set(name, producers);
		}
	}

	async put(jobId: string, name: string, payload: Uint8Array, fileName?: string): Promise<StoredArtifact> {
		this.assertOpen();
		if (this.entries.some((entry) => entry.jobId === jobId && entry.name === name)) {
			throw new DuplicateArtifactError(jobId, name);
		}
		const copy = Uint8Array.from(payload);
		const digest = crypto.createHash("sha256").update(copy).digest("hex");
		const entry: StoredArtifact = {
			jobId,
			name,
			digest,
			size: copy.byteLength,
			fileName,
			storedAt: new Date().toISOString(),
		};
		this.entries.push(entry);

		const count = this.refs.get(digest) ?? 0;
		this.refs.set(digest, count + 1);
		if (count === 0) {
			this.writes.set(digest, this.transport.write(digest, copy));
		}
		try {
			await this.writes.get(digest);
		} catch (error) {
			this.entries.splice(this.entries.indexOf(entry), 1);
			this.refs.delete(digest);
			this.writes.delete(digest);
			throw error;
		}
		return { ...entry };
	}

	async get(name: string): Promise<Uint8Array> {
		const entry = this.resolve(name);
		await this.writes.get(entry.digest);
		return Uint8Array.from(await this.transport.read(entry.digest));
	}

	/** Metadata of the artifact `get(name)` would return. */
	describe(name: string): StoredArtifact {
		return { ...this.resolve(name) };
	}

	markSucceeded(jobId: string): void {
		if (!this.succeeded.has(jobId)) {
			this.succeeded.set(jobId, this.succeeded.size);
		}
	}

	list(): StoredArtifact[] {
		return this.entries.map((entry) => ({ ...entry }));
	}

	/** Releases every payload; the store rejects all access afterwards. */
	async discard(): Promise<void> {
		if (this.discarded) {
			return;
		}
		this.discarded = true;
		await Promise.allSettled(this.writes.values());
		const digests = Array.from(this.refs.keys());
		this.refs.clear();
		this.writes.clear();
		await Promise.all(digests.map((digest) => this.transport.delete(digest)));
	}

	get isDiscarded(): boolean {
		return this.discarded;
	}

	private resolve(name: string): StoredArtifact {
		this.assertOpen();
		const stored = this.entries.filter((entry) => entry.name === name);
		const visible = stored
			.filter((entry) => this.succeeded.has(entry.jobId))
			.sort((a, b) => (this.succeeded.get(a.jobId) ?? 0) - (this.succeeded.get(b.jobId) ?? 0));
		if (visible.length > 0) {
			return visible[0];
		}

		const producers = new Set([...(this.declared.get(name) ?? []), ...stored.map((entry) => entry.jobId)]);
		if (producers.size === 0) {
			throw new ArtifactNotFoundError(name);
		}
		throw new ArtifactNotReadyError(name, Array.from(producers));
	}

	private assertOpen(): void {
		if (this.discarded) {
			throw new ArtifactsDiscardedError(this.runId);
		}
	}
}
