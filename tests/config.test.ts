import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";

function repo(files: Record<string, string> = {}): string {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-config-"));
	for (const [name, content] of Object.entries(files)) {
		fs.writeFileSync(path.join(root, name), content);
	}
	return root;
}

describe("config schema", () => {
	it("applies defaults", () => {
		expect(ConfigSchema.parse({})).toEqual({
			executor: "shell",
			shell: "sh",
			maxWorkers: 4,
			defaultTimeoutMinutes: 360,
			pipelinesDir: ".github/workflows",
			artifacts: { transport: "memory" },
			notify: {},
			env: {},
			vars: {},
			secrets: {},
		});
	});

	it("rejects unknown artifact transports", () => {
		expect(() => ConfigSchema.parse({ artifacts: { transport: "s3" } })).toThrow();
	});
});

describe("load config", () => {
	it("returns defaults when .pipewright.yml does not exist", () => {
		const loaded = loadConfig(repo());
		expect(loaded.path).toBeUndefined();
		expect(loaded.config.executor).toBe("shell");
	});

	it("loads and validates .pipewright.yml", () => {
		const root = repo({
			".pipewright.yml": [
				"executor: dry-run",
				"maxWorkers: 2",
				"artifacts:",
				"  transport: filesystem",
				"notify:",
				"  command: cat > result.json",
				"vars:",
				"  REGION: eu-west-1",
			].join("\n"),
		});

		const loaded = loadConfig(root);
		expect(loaded.path).toBe(path.join(root, ".pipewright.yml"));
		expect(loaded.config).toMatchObject({
			executor: "dry-run",
			maxWorkers: 2,
			artifacts: { transport: "filesystem" },
			notify: { command: "cat > result.json" },
			vars: { REGION: "eu-west-1" },
		});
	});

	it("treats an empty file as defaults", () => {
		expect(loadConfig(repo({ ".pipewright.yml": "" })).config.maxWorkers).toBe(4);
	});

	it("reports YAML syntax errors with a position", () => {
		const root = repo({ ".pipewright.yml": "env: [unclosed\n" });
		expect(() => loadConfig(root)).toThrow(new RegExp(`^${path.join(root, ".pipewright.yml")}:\\d+:\\d+ `));
	});

	it("reports schema violations by path", () => {
		const root = repo({ ".pipewright.yml": "maxWorkers: 0\n" });
		expect(() => loadConfig(root)).toThrow("Invalid .pipewright.yml: maxWorkers: Number must be greater than 0");
	});
});
