import { CycleError, DefinitionError } from "./errors.js";

export type GraphNode = {
	id: string;
	dependsOn: readonly string[];
};

export type Verdict = { run: true } | { run: false; reason: string };

export type Readiness = {
	run: string[];
	skip: { jobId: string; reason: string }[];
};

/**
 * Dependency graph over jobs. Construction rejects duplicate ids, dangling
 * dependencies and cycles, so every graph that exists is a DAG.
 */
export class JobGraph<T extends GraphNode = GraphNode> {
	readonly order: string[];
	private readonly nodes = new Map<string, T>();
	private readonly dependents = new Map<string, string[]>();

	constructor(nodes: readonly T[]) {
		for (const node of nodes) {
			if (this.nodes.has(node.id)) {
				throw new DefinitionError(`Duplicate job id '${node.id}'`, { jobId: node.id });
			}
			this.nodes.set(node.id, node);
			this.dependents.set(node.id, []);
		}

		for (const node of nodes) {
			for (const dep of node.dependsOn) {
				const dependents = this.dependents.get(dep);
				if (!dependents) {
					throw new DefinitionError(`Job '${node.id}' needs unknown job '${dep}'`, {
						jobId: node.id,
						needs: dep,
					});
				}
				if (!dependents.includes(node.id)) {
					dependents.push(node.id);
				}
			}
		}

		const cycle = findCycle(nodes, this.nodes);
		if (cycle) {
			throw new CycleError(cycle);
		}
		this.order = topologicalOrder(nodes, this.dependents);
	}

	get size(): number {
		return this.nodes.size;
	}

	ids(): string[] {
		return Array.from(this.nodes.keys());
	}

	has(id: string): boolean {
		return this.nodes.has(id);
	}

	get(id: string): T {
		const node = this.nodes.get(id);
		if (!node) {
			throw new Error(`Job not found: ${id}`);
		}
		return node;
	}

	dependenciesOf(id: string): string[] {
		return [...this.get(id).dependsOn];
	}

	dependentsOf(id: string): string[] {
		return [...(this.dependents.get(id) ?? [])];
	}

	/** Every job that transitively depends on `id`. */
	descendantsOf(id: string): string[] {
		return this.reach(id, (current) => this.dependents.get(current) ?? []);
	}

	/** Every job `id` transitively depends on. */
	ancestorsOf(id: string): string[] {
		return this.reach(id, (current) => this.get(current).dependsOn);
	}

	/** Jobs not yet completed whose dependencies are all completed. */
	candidates(completed: ReadonlySet<string>): string[] {
		return this.order.filter(
			(id) => !completed.has(id) && this.get(id).dependsOn.every((dep) => completed.has(dep)),
		);
	}

	/**
	 * Splits the candidates into jobs that may start and jobs that are skipped
	 * because `judge` rejected them (typically a false condition).
	 */
	ready(completed: ReadonlySet<string>, judge?: (node: T) => Verdict): Readiness {
		const readiness: Readiness = { run: [], skip: [] };
		for (const id of this.candidates(completed)) {
			const verdict = judge ? judge(this.get(id)) : { run: true as const };
			if (verdict.run) {
				readiness.run.push(id);
			} else {
				readiness.skip.push({ jobId: id, reason: verdict.reason });
			}
		}
		return readiness;
	}

	/** Groups of jobs that can run together, in dependency order. */
	layers(): string[][] {
		const layers: string[][] = [];
		const assigned = new Set<string>();
		while (assigned.size < this.nodes.size) {
			const layer = this.candidates(assigned);
			layer.forEach((id) => assigned.add(id));
			layers.push(layer);
		}
		return layers;
	}

	private reach(start: string, next: (id: string) => readonly string[]): string[] {
		const seen = new Set<string>();
		const queue = [...next(start)];
		while (queue.length > 0) {
			const id = queue.shift();
			if (id === undefined || seen.has(id)) {
				continue;
			}
			seen.add(id);
			queue.push(...next(id));
		}
		return this.order.filter((id) => seen.has(id));
	}
}

function findCycle<T extends GraphNode>(nodes: readonly T[], lookup: Map<string, T>): string[] | null {
	const visited = new Set<string>();
	const stack: string[] = [];
	const onStack = new Set<string>();

	const visit = (id: string): string[] | null => {
		if (onStack.has(id)) {
			return [...stack.slice(stack.indexOf(id)), id];
		}
		if (visited.has(id)) {
			return null;
		}
		visited.add(id);
		stack.push(id);
		onStack.add(id);
		for (const dep of lookup.get(id)?.dependsOn ?? []) {
			const cycle = visit(dep);
			if (cycle) {
				return cycle;
			}
		}
		stack.pop();
		onStack.delete(id);
		return null;
	};

	for (const node of nodes) {
		const cycle = visit(node.id);
		if (cycle) {
			return cycle;
		}
	}
	return null;
}

function topologicalOrder<T extends GraphNode>(
	nodes: readonly T[],
	dependents: Map<string, string[]>,
): string[] {
	const inDegree = new Map(nodes.map((node) => [node.id, new Set(node.dependsOn).size]));
	const queue = nodes.filter((node) => inDegree.get(node.id) === 0).map((node) => node.id);
	const ordered: string[] = [];

	while (queue.length > 0) {
		const id = queue.shift();
		if (id === undefined) {
			continue;
		}
		ordered.push(id);
		for (const next of dependents.get(id) ?? []) {
			const degree = (inDegree.get(next) ?? 0) - 1;
			inDegree.set(next, degree);
			if (degree === 0) {
				queue.push(next);
			}
		}
	}

	return ordered;
}
