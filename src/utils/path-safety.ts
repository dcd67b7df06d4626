import path from "node:path";

/** Resolves `childPath` under `baseDir`, refusing anything that escapes it. */
export function ensureWithinBase(baseDir: string, childPath: string, label: string): string {
	const base = path.resolve(baseDir);
	const resolved = path.resolve(base, childPath);
	const rel = path.relative(base, resolved);
	if (rel.startsWith("..") || path.isAbsolute(rel)) {
		throw new Error(`Invalid ${label} '${childPath}': path escapes ${base}`);
	}
	return resolved;
}

/**
 * File-system friendly form of a job or artifact name; matrix ids such as
 * `build[linux, 20]` become `build-linux-20`.
 */
export function sanitizePathSegment(value: string, fallback: string): string {
	const normalized = value
		.trim()
		.replace(/[\\/]+/g, "-")
		.replace(/[^a-zA-Z0-9._-]+/g, "-")
		.replace(/^[-.]+|-+$/g, "")
		.slice(0, 96);
	return normalized.length > 0 ? normalized : fallback;
}
