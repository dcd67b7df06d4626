import crypto from "node:crypto";
import { ExpansionError } from "./errors.js";
import { hasPlaceholders, interpolate } from "./expression.js";
import type { ExpressionScope } from "./expression.js";
import type { JobInstance, JobTemplate, MatrixCombination, MatrixDefinition, MatrixValue } from "./types.js";

const MAX_ID_VALUE_LENGTH = 24;

/**
 * Expands a job template into concrete instances, one per matrix
 * combination. Templates without a matrix yield a single instance whose id
 * is the template id. Instance `dependsOn` is left empty for the planner.
 */
export function expandMatrix(template: JobTemplate, scope: ExpressionScope = { contexts: {} }): JobInstance[] {
	if (!template.matrix) {
		return [
			createInstance(template, {
				id: template.id,
				name: interpolate(template.name, scope),
				matrix: null,
			}),
		];
	}

	const matrix = template.matrix;
	const combinations = computeCombinations(template.id, matrix);
	const seen = new Set<string>();
	return combinations.map((combination) => {
		const id = instanceId(template.id, combination);
		if (seen.has(id)) {
			throw new ExpansionError(template.id, `two combinations map to the same id '${id}'`);
		}
		seen.add(id);
		return createInstance(template, {
			id,
			name: instanceName(template.name, combination, scope),
			matrix: combination,
		});
	});
}

export function computeCombinations(templateId: string, matrix: MatrixDefinition): MatrixCombination[] {
	const axes = Object.entries(matrix.axes);
	for (const [axis, values] of axes) {
		if (values.length === 0) {
			throw new ExpansionError(templateId, `axis '${axis}' has no values`);
		}
	}

	const product = axes.length === 0 ? [] : cartesian(axes);
	const kept = product.filter((combination) => !matrix.exclude.some((entry) => matches(combination, entry)));
	const excludedAll = product.length > 0 && kept.length === 0;

	const originalKeys = new Set(axes.map(([axis]) => axis));
	const combinations = kept.map((combination) => ({ ...combination }));
	const extras: MatrixCombination[] = [];
	for (const entry of matrix.include) {
		const originals = Object.entries(entry).filter(([key]) => originalKeys.has(key));
		let extended = false;
		for (const combination of combinations) {
			if (originals.every(([key, value]) => sameValue(combination[key], value))) {
				for (const [key, value] of Object.entries(entry)) {
					if (!originalKeys.has(key)) {
						combination[key] = value;
					}
				}
				extended = true;
			}
		}
		if (!extended) {
			extras.push({ ...entry });
		}
	}

	const all = [...combinations, ...extras];
	if (all.length === 0) {
		throw new ExpansionError(
			templateId,
			excludedAll ? "every combination is excluded" : "matrix produces no combinations",
		);
	}
	return all;
}

export function instanceId(templateId: string, combination: MatrixCombination): string {
	const parts = Object.values(combination).map((value) => {
		const text = String(value);
		if (text.length > MAX_ID_VALUE_LENGTH || /[[\],]/.test(text)) {
			return crypto.createHash("sha1").update(text).digest("hex").slice(0, 8);
		}
		return text;
	});
	return `${templateId}[${parts.join(", ")}]`;
}

function instanceName(template: string, combination: MatrixCombination, scope: ExpressionScope): string {
	if (hasPlaceholders(template)) {
		return interpolate(template, {
			...scope,
			contexts: { ...scope.contexts, matrix: combination },
		});
	}
	return `${template} (${Object.values(combination).map(String).join(", ")})`;
}

function cartesian(axes: [string, MatrixValue[]][]): MatrixCombination[] {
	return axes.reduce<MatrixCombination[]>(
		(acc, [axis, values]) => acc.flatMap((combination) => values.map((value) => ({ ...combination, [axis]: value }))),
		[{}],
	);
}

function matches(combination: MatrixCombination, entry: MatrixCombination): boolean {
	return Object.entries(entry).every(([key, value]) => sameValue(combination[key], value));
}

function sameValue(left: MatrixValue | undefined, right: MatrixValue): boolean {
	return left !== undefined && String(left) === String(right);
}

function createInstance(
	template: JobTemplate,
	fields: { id: string; name: string; matrix: MatrixCombination | null },
): JobInstance {
	return {
		id: fields.id,
		templateId: template.id,
		name: fields.name,
		needs: [...template.needs],
		dependsOn: [],
		if: template.if,
		runsOn: template.runsOn,
		steps: template.steps,
		outputs: { ...template.outputs },
		inputs: [...template.inputs],
		env: { ...template.env },
		matrix: fields.matrix,
		expansion: template.matrix
			? {
					templateId: template.id,
					failFast: template.matrix.failFast,
					maxParallel: template.matrix.maxParallel,
				}
			: null,
		timeoutMinutes: template.timeoutMinutes,
		allowSkippedNeeds: template.allowSkippedNeeds,
	};
}

/** Stand-in for a template whose matrix could not be expanded. */
export function failedExpansion(template: JobTemplate, error: ExpansionError, name: string): JobInstance {
	return {
		...createInstance(template, { id: template.id, name, matrix: null }),
		preflightError: { code: error.code, message: error.message },
	};
}
