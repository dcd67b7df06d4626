import fs from "node:fs";
import path from "node:path";
import type { ArtifactTransport } from "../core/artifacts.js";
import { ensureWithinBase } from "../utils/path-safety.js";

const DIGEST = /^[a-f0-9]{64}$/;

/** Keeps artifact blobs as files named by their digest under one directory. */
export class FileArtifactTransport implements ArtifactTransport {
	constructor(private readonly dir: string) {}

	async write(key: string, payload: Uint8Array): Promise<void> {
		const target = this.pathFor(key);
		await fs.promises.mkdir(path.dirname(target), { recursive: true });
		const temp = `${target}.tmp`;
		await fs.promises.writeFile(temp, payload);
		await fs.promises.rename(temp, target);
	}

	async read(key: string): Promise<Uint8Array> {
		return new Uint8Array(await fs.promises.readFile(this.pathFor(key)));
	}

	async delete(key: string): Promise<void> {
		await fs.promises.rm(this.pathFor(key), { force: true });
	}

	private pathFor(key: string): string {
		if (!DIGEST.test(key)) {
			throw new Error(`Invalid artifact key '${key}'`);
		}
		return ensureWithinBase(this.dir, path.join("blobs", key.slice(0, 2), key), "artifact blob");
	}
}
