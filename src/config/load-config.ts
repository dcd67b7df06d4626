import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ZodError } from "zod";
import { ConfigSchema } from "./schema.js";
import type { PipewrightConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: PipewrightConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = ".pipewright.yml";

export function loadConfig(repoRoot: string): ConfigLoadResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	if (!fs.existsSync(configPath)) {
		return { config: ConfigSchema.parse({}), path: undefined };
	}

	const raw = fs.readFileSync(configPath, "utf-8");
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const pos = error.linePos?.[0];
		throw new Error(`${configPath}:${pos?.line ?? 0}:${pos?.col ?? 0} ${error.message}`);
	}
	try {
		return { config: ConfigSchema.parse(doc.toJSON() ?? {}), path: configPath };
	} catch (error) {
		if (error instanceof ZodError) {
			const issues = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
			throw new Error(`Invalid ${DEFAULT_CONFIG_PATH}: ${issues.join("; ")}`);
		}
		throw error;
	}
}
