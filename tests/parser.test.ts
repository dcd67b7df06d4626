import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { discoverPipelines, findPipelineFiles, resolvePipelinePath } from "../src/core/discovery.js";
import { CycleError, DefinitionError } from "../src/core/errors.js";
import { parsePipelineSource } from "../src/core/parser.js";

const CI = [
	"name: CI",
	"on:",
	"  push:",
	"    branches: [main]",
	"  pull_request:",
	"concurrency:",
	"  group: ci-${{ github.ref }}",
	"  cancel-in-progress: true",
	"required:",
	"  - test",
	"  - job: lint",
	"    allow-skipped: true",
	"defaults:",
	"  timeout-minutes: 30",
	"jobs:",
	"  lint:",
	"    runs-on: ubuntu-latest",
	"    steps:",
	"      - run: echo lint",
	"  build:",
	"    name: Build ${{ matrix.os }}",
	"    strategy:",
	"      fail-fast: false",
	"      max-parallel: 2",
	"      matrix:",
	"        os: [linux, mac]",
	"        exclude:",
	"          - os: mac",
	"    steps:",
	"      - name: Compile",
	"        run: |",
	"          make",
	"          make install",
	"      - uses: actions/upload-artifact@v4",
	"        with:",
	"          name: dist",
	"          path: out/app.tgz",
	"  test:",
	"    needs: build",
	"    if: github.event_name == 'push'",
	"    timeout-minutes: 10",
	"    steps:",
	"      - uses: actions/download-artifact@v4",
	"        with:",
	"          name: dist",
	"      - run: ./test.sh",
	"        continue-on-error: true",
].join("\n");

describe("pipeline parser", () => {
	it("parses triggers, concurrency, required checks and jobs", () => {
		const pipeline = parsePipelineSource(CI, "ci.yml");

		expect(pipeline.name).toBe("CI");
		expect(pipeline.triggers).toEqual([{ event: "push", branches: ["main"] }, { event: "pull_request" }]);
		expect(pipeline.concurrency).toEqual({ group: "ci-${{ github.ref }}", cancelInProgress: true });
		expect(pipeline.required).toEqual([
			{ job: "test", allowSkipped: false },
			{ job: "lint", allowSkipped: true },
		]);
		expect(pipeline.defaultTimeoutMinutes).toBe(30);
		expect(pipeline.jobs.map((job) => job.id)).toEqual(["lint", "build", "test"]);
		expect(pipeline.jobs[0]?.runsOn).toBe("ubuntu-latest");
	});

	it("parses matrix strategy and artifact steps", () => {
		const [, build, test] = parsePipelineSource(CI, "ci.yml").jobs;

		expect(build?.matrix).toEqual({
			axes: { os: ["linux", "mac"] },
			include: [],
			exclude: [{ os: "mac" }],
			failFast: false,
			maxParallel: 2,
		});
		expect(build?.outputs).toEqual({ dist: "out/app.tgz" });
		expect(build?.steps.map((step) => [step.id, step.name])).toEqual([
			["build-step-1", "Compile"],
			["build-step-2", "actions/upload-artifact@v4"],
		]);
		expect(build?.steps[0]?.run).toBe("make\nmake install\n");

		expect(test?.needs).toEqual(["build"]);
		expect(test?.if?.source).toBe("github.event_name == 'push'");
		expect(test?.timeoutMinutes).toBe(10);
		expect(test?.inputs).toEqual([{ name: "dist" }]);
		expect(test?.steps[1]).toMatchObject({ name: "./test.sh", continueOnError: true });
	});

	it("reports YAML syntax errors with a position", () => {
		expect(() => parsePipelineSource("jobs:\n  build: [unclosed", "bad.yml")).toThrow(/^bad\.yml:\d+:\d+ /);
	});

	it("reports schema problems by path", () => {
		expect(() => parsePipelineSource("name: CI", "ci.yml")).toThrow(new DefinitionError("ci.yml: jobs: Required"));
		expect(() =>
			parsePipelineSource(["jobs:", "  build:", "    steps:", "      - name: nothing"].join("\n"), "ci.yml"),
		).toThrow("ci.yml: jobs.build.steps.0: A step needs either `run` or `uses`");
	});

	it("rejects cycles and unknown needs", () => {
		const cyclic = ["jobs:", "  a:", "    needs: b", "  b:", "    needs: a"].join("\n");
		expect(() => parsePipelineSource(cyclic, "ci.yml")).toThrow(CycleError);
		expect(() => parsePipelineSource(cyclic, "ci.yml")).toThrow("Circular dependency in job graph: a -> b -> a");

		const dangling = ["jobs:", "  test:", "    needs: build"].join("\n");
		expect(() => parsePipelineSource(dangling, "ci.yml")).toThrow("Job 'test' needs unknown job 'build'");
	});

	it("rejects references to undefined matrix axes", () => {
		const source = [
			"jobs:",
			"  build:",
			"    strategy:",
			"      matrix:",
			"        os: [linux]",
			"    steps:",
			"      - run: echo ${{ matrix.arch }}",
		].join("\n");
		expect(() => parsePipelineSource(source, "ci.yml")).toThrow(
			"ci.yml: jobs.build: 'matrix.arch' refers to undefined matrix axis 'arch'",
		);

		const exclude = [
			"jobs:",
			"  build:",
			"    strategy:",
			"      matrix:",
			"        os: [linux]",
			"        exclude:",
			"          - arch: arm",
		].join("\n");
		expect(() => parsePipelineSource(exclude, "ci.yml")).toThrow(
			"ci.yml: jobs.build: exclude refers to undefined matrix axis 'arch'",
		);
	});

	it("accepts secrets in step commands", () => {
		const source = ["jobs:", "  deploy:", "    steps:", "      - run: deploy --token ${{ secrets.DEPLOY_TOKEN }}"].join(
			"\n",
		);
		const pipeline = parsePipelineSource(source, "ci.yml");
		expect(pipeline.jobs.map((job) => job.id)).toEqual(["deploy"]);
	});

	it("rejects invalid conditions and unknown required checks", () => {
		const condition = ["jobs:", "  build:", "    if: github.event_name =="].join("\n");
		expect(() => parsePipelineSource(condition, "ci.yml")).toThrow(
			"ci.yml: jobs.build: Unexpected end of expression in expression 'github.event_name =='",
		);

		const required = ["required: [deploy]", "jobs:", "  build:", "    steps:", "      - run: make"].join("\n");
		expect(() => parsePipelineSource(required, "ci.yml")).toThrow(
			"ci.yml: required check 'deploy' does not name a job",
		);
	});
});

describe("pipeline discovery", () => {
	function repoWithPipelines(): string {
		const repo = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-discovery-"));
		const dir = path.join(repo, ".github", "workflows");
		fs.mkdirSync(dir, { recursive: true });
		fs.writeFileSync(path.join(dir, "release.yaml"), "name: Release\njobs:\n  ship:\n    steps:\n      - run: echo ship\n");
		fs.writeFileSync(path.join(dir, "ci.yml"), "name: CI\njobs:\n  build:\n    steps:\n      - run: make\n");
		fs.writeFileSync(path.join(dir, "notes.txt"), "not a pipeline");
		return repo;
	}

	it("finds pipeline files in name order", () => {
		const repo = repoWithPipelines();
		const files = findPipelineFiles(repo).map((file) => path.basename(file));
		expect(files).toEqual(["ci.yml", "release.yaml"]);
		expect(discoverPipelines(repo).map((pipeline) => pipeline.name)).toEqual(["CI", "Release"]);
	});

	it("resolves a selector by file name, bare name or display name", () => {
		const repo = repoWithPipelines();
		const dir = path.join(repo, ".github", "workflows");
		expect(resolvePipelinePath(repo, "ci.yml")).toBe(path.join(dir, "ci.yml"));
		expect(resolvePipelinePath(repo, "release")).toBe(path.join(dir, "release.yaml"));
		expect(resolvePipelinePath(repo, "Release")).toBe(path.join(dir, "release.yaml"));
		expect(resolvePipelinePath(repo, "nightly")).toBeUndefined();
	});

	it("returns no files when the directory is missing", () => {
		const repo = fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-empty-"));
		expect(findPipelineFiles(repo)).toEqual([]);
	});
});
