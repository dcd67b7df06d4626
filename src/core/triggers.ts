import { refName, refType } from "./context.js";
import type { PipelineDefinition, TriggerEvent, TriggerFilter } from "./types.js";

export type TriggerMatch = { matched: true } | { matched: false; reason: string };

export function matchTrigger(pipeline: PipelineDefinition, event: TriggerEvent): TriggerMatch {
	if (pipeline.triggers.length === 0) {
		return { matched: true };
	}
	const filters = pipeline.triggers.filter((trigger) => trigger.event === event.name);
	if (filters.length === 0) {
		const accepted = pipeline.triggers.map((trigger) => trigger.event).join(", ");
		return { matched: false, reason: `event '${event.name}' is not one of: ${accepted}` };
	}

	let reason = "";
	for (const filter of filters) {
		const result = matchFilter(filter, event);
		if (result.matched) {
			return result;
		}
		reason = result.reason;
	}
	return { matched: false, reason };
}

function matchFilter(filter: TriggerFilter, event: TriggerEvent): TriggerMatch {
	if (filter.types && event.action && !filter.types.includes(event.action)) {
		return { matched: false, reason: `activity type '${event.action}' is not one of: ${filter.types.join(", ")}` };
	}

	const refResult = event.name === "push" ? matchPushRef(filter, event.ref) : matchBaseRef(filter, event);
	if (!refResult.matched) {
		return refResult;
	}

	return matchPaths(filter, event.changedFiles);
}

function matchPushRef(filter: TriggerFilter, ref: string): TriggerMatch {
	const name = refName(ref);
	if (refType(ref) === "tag") {
		if (filter.tags) {
			return matchesFilters(name, filter.tags)
				? { matched: true }
				: { matched: false, reason: `tag '${name}' does not match tags filter` };
		}
		if (filter.tagsIgnore && matchesFilters(name, filter.tagsIgnore)) {
			return { matched: false, reason: `tag '${name}' is ignored` };
		}
		if (filter.branches || filter.branchesIgnore) {
			return { matched: false, reason: "tag pushes are not selected by branch filters" };
		}
		return { matched: true };
	}

	if ((filter.tags || filter.tagsIgnore) && !filter.branches && !filter.branchesIgnore) {
		return { matched: false, reason: "branch pushes are not selected by tag filters" };
	}
	return matchBranch(filter, name);
}

function matchBaseRef(filter: TriggerFilter, event: TriggerEvent): TriggerMatch {
	const base = event.baseRef ?? (event.name === "pull_request" ? undefined : refName(event.ref));
	if (base === undefined) {
		return { matched: true };
	}
	return matchBranch(filter, refName(base));
}

function matchBranch(filter: TriggerFilter, branch: string): TriggerMatch {
	if (filter.branches && !matchesFilters(branch, filter.branches)) {
		return { matched: false, reason: `branch '${branch}' does not match branches filter` };
	}
	if (filter.branchesIgnore && matchesFilters(branch, filter.branchesIgnore)) {
		return { matched: false, reason: `branch '${branch}' is ignored` };
	}
	return { matched: true };
}

function matchPaths(filter: TriggerFilter, changedFiles: string[] | undefined): TriggerMatch {
	if (!changedFiles || changedFiles.length === 0) {
		return { matched: true };
	}
	if (filter.pathsIgnore) {
		const ignore = filter.pathsIgnore;
		if (changedFiles.every((file) => matchesFilters(file, ignore))) {
			return { matched: false, reason: "every changed file matches paths-ignore" };
		}
	}
	if (filter.paths) {
		const include = filter.paths;
		if (!changedFiles.some((file) => matchesFilters(file, include))) {
			return { matched: false, reason: "no changed file matches paths" };
		}
	}
	return { matched: true };
}

/** Ordered glob filters; `!pattern` negates and the last match wins. */
export function matchesFilters(value: string, patterns: string[]): boolean {
	let matched = false;
	for (const pattern of patterns) {
		if (pattern.startsWith("!")) {
			if (matchesGlob(value, pattern.slice(1))) {
				matched = false;
			}
		} else if (matchesGlob(value, pattern)) {
			matched = true;
		}
	}
	return matched;
}

export function matchesGlob(text: string, pattern: string): boolean {
	let source = "";
	for (let i = 0; i < pattern.length; i += 1) {
		const char = pattern[i];
		if (char === "*") {
			if (pattern[i + 1] === "*") {
				const slash = pattern[i + 2] === "/";
				source += slash ? "(?:.*/)?" : ".*";
				i += slash ? 2 : 1;
			} else {
				source += "[^/]*";
			}
		} else if (char === "?") {
			source += "[^/]";
		} else {
			source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
		}
	}
	return new RegExp(`^${source}$`).test(text);
}
