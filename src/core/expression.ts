import { ExpressionError } from "./errors.js";

/**
 * Typed condition language for `if:` predicates, job names and concurrency
 * groups. Sources are parsed once into a tree and evaluated against an
 * explicit scope; nothing is resolved through string substitution.
 */

export type ExpressionValue =
	| string
	| number
	| boolean
	| null
	| ExpressionValue[]
	| { [key: string]: ExpressionValue };

export type ContextName =
	| "github"
	| "env"
	| "vars"
	| "secrets"
	| "inputs"
	| "matrix"
	| "needs"
	| "job"
	| "steps";

export type FunctionName =
	| "always"
	| "success"
	| "failure"
	| "cancelled"
	| "contains"
	| "startsWith"
	| "endsWith"
	| "format"
	| "join"
	| "toJSON";

export type CompareOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type ExpressionNode =
	| { kind: "literal"; value: string | number | boolean | null }
	| { kind: "context"; name: ContextName }
	| { kind: "member"; object: ExpressionNode; property: string }
	| { kind: "index"; object: ExpressionNode; index: ExpressionNode }
	| { kind: "not"; operand: ExpressionNode }
	| { kind: "compare"; operator: CompareOperator; left: ExpressionNode; right: ExpressionNode }
	| { kind: "logical"; operator: "&&" | "||"; left: ExpressionNode; right: ExpressionNode }
	| { kind: "call"; name: FunctionName; args: ExpressionNode[] };

export type Expression = {
	source: string;
	root: ExpressionNode;
};

export type StatusFunctions = {
	success(): boolean;
	failure(): boolean;
	cancelled(): boolean;
};

export type ExpressionScope = {
	contexts: Partial<Record<ContextName, ExpressionValue>>;
	status?: StatusFunctions;
};

const CONTEXTS: readonly ContextName[] = [
	"github",
	"env",
	"vars",
	"secrets",
	"inputs",
	"matrix",
	"needs",
	"job",
	"steps",
];

const FUNCTION_ARITY: Record<FunctionName, { min: number; max: number }> = {
	always: { min: 0, max: 0 },
	success: { min: 0, max: 0 },
	failure: { min: 0, max: 0 },
	cancelled: { min: 0, max: 0 },
	contains: { min: 2, max: 2 },
	startsWith: { min: 2, max: 2 },
	endsWith: { min: 2, max: 2 },
	format: { min: 1, max: Number.POSITIVE_INFINITY },
	join: { min: 1, max: 2 },
	toJSON: { min: 1, max: 1 },
};

const STATUS_FUNCTIONS = new Set<FunctionName>(["always", "success", "failure", "cancelled"]);

const WRAPPED = /^\s*\$\{\{([\s\S]*)\}\}\s*$/;
const PLACEHOLDER = /\$\{\{([\s\S]*?)\}\}/g;

type Token =
	| { type: "number"; value: number; pos: number }
	| { type: "string"; value: string; pos: number }
	| { type: "ident"; value: string; pos: number }
	| { type: "punct"; value: string; pos: number }
	| { type: "end"; pos: number };

const PUNCTUATION = ["==", "!=", "<=", ">=", "&&", "||", "<", ">", "!", "(", ")", "[", "]", ".", ","];

export function parseExpression(input: string): Expression {
	const wrapped = WRAPPED.exec(input);
	const source = (wrapped ? wrapped[1] : input).trim();
	if (source.length === 0) {
		throw new ExpressionError("Empty expression", input);
	}
	const parser = new Parser(tokenize(source), source);
	return { source, root: parser.parse() };
}

export function evaluate(expression: Expression, scope: ExpressionScope): ExpressionValue {
	return evaluateNode(expression.root, scope);
}

export function evaluateCondition(expression: Expression, scope: ExpressionScope): boolean {
	return isTruthy(evaluate(expression, scope));
}

/** True when the expression calls always(), success(), failure() or cancelled(). */
export function usesStatusFunction(expression: Expression): boolean {
	let found = false;
	walk(expression.root, (node) => {
		if (node.kind === "call" && STATUS_FUNCTIONS.has(node.name)) {
			found = true;
		}
	});
	return found;
}

/**
 * Context paths with statically known segments, e.g. `matrix.os` and
 * `matrix['arch']` both yield ["matrix", "os"] / ["matrix", "arch"].
 */
export function contextPaths(expression: Expression): string[][] {
	const paths: string[][] = [];
	walk(expression.root, (node) => {
		if (node.kind === "member" || node.kind === "index") {
			const path = staticPath(node);
			if (path && path.length === 2) {
				paths.push(path);
			}
		}
	});
	return paths;
}

export function templateExpressions(text: string): Expression[] {
	return Array.from(text.matchAll(PLACEHOLDER), (match) => parseExpression(match[1]));
}

export function hasPlaceholders(text: string): boolean {
	return text.includes("${{");
}

export function interpolate(text: string, scope: ExpressionScope): string {
	return text.replace(PLACEHOLDER, (_match, body: string) =>
		stringify(evaluate(parseExpression(body), scope)),
	);
}

export function isTruthy(value: ExpressionValue): boolean {
	if (value === null || value === false || value === "" || value === 0) {
		return false;
	}
	if (typeof value === "number" && Number.isNaN(value)) {
		return false;
	}
	return true;
}

export function stringify(value: ExpressionValue): string {
	if (value === null) {
		return "";
	}
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return JSON.stringify(value);
}

function tokenize(source: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;
	while (i < source.length) {
		const char = source[i];
		if (/\s/.test(char)) {
			i += 1;
			continue;
		}
		if (char === "'") {
			let value = "";
			let j = i + 1;
			for (;;) {
				if (j >= source.length) {
					throw new ExpressionError("Unterminated string", source);
				}
				if (source[j] === "'") {
					if (source[j + 1] === "'") {
						value += "'";
						j += 2;
						continue;
					}
					break;
				}
				value += source[j];
				j += 1;
			}
			tokens.push({ type: "string", value, pos: i });
			i = j + 1;
			continue;
		}
		const number = /^-?\d+(\.\d+)?/.exec(source.slice(i));
		if (number) {
			tokens.push({ type: "number", value: Number(number[0]), pos: i });
			i += number[0].length;
			continue;
		}
		const ident = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(i));
		if (ident) {
			tokens.push({ type: "ident", value: ident[0], pos: i });
			i += ident[0].length;
			continue;
		}
		const punct = PUNCTUATION.find((candidate) => source.startsWith(candidate, i));
		if (!punct) {
			throw new ExpressionError(`Unexpected character '${char}' at ${i}`, source);
		}
		tokens.push({ type: "punct", value: punct, pos: i });
		i += punct.length;
	}
	tokens.push({ type: "end", pos: source.length });
	return tokens;
}

class Parser {
	private index = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly source: string,
	) {}

	parse(): ExpressionNode {
		const node = this.parseOr();
		const next = this.peek();
		if (next.type !== "end") {
			throw new ExpressionError(`Unexpected token at ${next.pos}`, this.source);
		}
		return node;
	}

	private parseOr(): ExpressionNode {
		let left = this.parseAnd();
		while (this.acceptPunct("||")) {
			left = { kind: "logical", operator: "||", left, right: this.parseAnd() };
		}
		return left;
	}

	private parseAnd(): ExpressionNode {
		let left = this.parseEquality();
		while (this.acceptPunct("&&")) {
			left = { kind: "logical", operator: "&&", left, right: this.parseEquality() };
		}
		return left;
	}

	private parseEquality(): ExpressionNode {
		let left = this.parseComparison();
		for (;;) {
			const operator = this.acceptPunct("==") ?? this.acceptPunct("!=");
			if (!operator) {
				return left;
			}
			left = { kind: "compare", operator, left, right: this.parseComparison() };
		}
	}

	private parseComparison(): ExpressionNode {
		let left = this.parseUnary();
		for (;;) {
			const operator =
				this.acceptPunct("<=") ?? this.acceptPunct(">=") ?? this.acceptPunct("<") ?? this.acceptPunct(">");
			if (!operator) {
				return left;
			}
			left = { kind: "compare", operator, left, right: this.parseUnary() };
		}
	}

	private parseUnary(): ExpressionNode {
		if (this.acceptPunct("!")) {
			return { kind: "not", operand: this.parseUnary() };
		}
		return this.parsePostfix(this.parsePrimary());
	}

	private parsePrimary(): ExpressionNode {
		const token = this.next();
		switch (token.type) {
			case "number":
			case "string":
				return { kind: "literal", value: token.value };
			case "ident":
				return this.parseIdentifier(token.value, token.pos);
			case "punct":
				if (token.value === "(") {
					const inner = this.parseOr();
					this.expectPunct(")");
					return inner;
				}
				throw new ExpressionError(`Unexpected token '${token.value}' at ${token.pos}`, this.source);
			case "end":
				throw new ExpressionError("Unexpected end of expression", this.source);
		}
	}

	private parseIdentifier(name: string, pos: number): ExpressionNode {
		if (name === "true" || name === "false") {
			return { kind: "literal", value: name === "true" };
		}
		if (name === "null") {
			return { kind: "literal", value: null };
		}
		if (this.acceptPunct("(")) {
			const fn = toFunctionName(name);
			if (!fn) {
				throw new ExpressionError(`Unknown function '${name}'`, this.source);
			}
			const args: ExpressionNode[] = [];
			if (!this.acceptPunct(")")) {
				do {
					args.push(this.parseOr());
				} while (this.acceptPunct(","));
				this.expectPunct(")");
			}
			const arity = FUNCTION_ARITY[fn];
			if (args.length < arity.min || args.length > arity.max) {
				throw new ExpressionError(`Wrong number of arguments for ${fn}()`, this.source);
			}
			return { kind: "call", name: fn, args };
		}
		const context = CONTEXTS.find((candidate) => candidate === name);
		if (!context) {
			throw new ExpressionError(`Unrecognized named value '${name}' at ${pos}`, this.source);
		}
		return { kind: "context", name: context };
	}

	private parsePostfix(node: ExpressionNode): ExpressionNode {
		let current = node;
		for (;;) {
			if (this.acceptPunct(".")) {
				const token = this.next();
				if (token.type !== "ident") {
					throw new ExpressionError(`Expected property name at ${token.pos}`, this.source);
				}
				current = { kind: "member", object: current, property: token.value };
				continue;
			}
			if (this.acceptPunct("[")) {
				const index = this.parseOr();
				this.expectPunct("]");
				current = { kind: "index", object: current, index };
				continue;
			}
			return current;
		}
	}

	private peek(): Token {
		return this.tokens[this.index];
	}

	private next(): Token {
		const token = this.tokens[this.index];
		if (token.type !== "end") {
			this.index += 1;
		}
		return token;
	}

	private acceptPunct<T extends string>(value: T): T | undefined {
		const token = this.peek();
		if (token.type === "punct" && token.value === value) {
			this.index += 1;
			return value;
		}
		return undefined;
	}

	private expectPunct(value: string): void {
		if (!this.acceptPunct(value)) {
			throw new ExpressionError(`Expected '${value}' at ${this.peek().pos}`, this.source);
		}
	}
}

function toFunctionName(name: string): FunctionName | undefined {
	const lower = name.toLowerCase();
	return Object.keys(FUNCTION_ARITY)
		.filter(isFunctionName)
		.find((candidate) => candidate.toLowerCase() === lower);
}

function isFunctionName(value: string): value is FunctionName {
	return Object.prototype.hasOwnProperty.call(FUNCTION_ARITY, value);
}

function evaluateNode(node: ExpressionNode, scope: ExpressionScope): ExpressionValue {
	switch (node.kind) {
		case "literal":
			return node.value;
		case "context":
			return scope.contexts[node.name] ?? null;
		case "member":
			return property(evaluateNode(node.object, scope), node.property);
		case "index": {
			const target = evaluateNode(node.object, scope);
			const key = evaluateNode(node.index, scope);
			if (Array.isArray(target) && typeof key === "number") {
				return target[key] ?? null;
			}
			return typeof key === "string" ? property(target, key) : null;
		}
		case "not":
			return !isTruthy(evaluateNode(node.operand, scope));
		case "logical": {
			const left = evaluateNode(node.left, scope);
			if (node.operator === "&&") {
				return isTruthy(left) ? evaluateNode(node.right, scope) : left;
			}
			return isTruthy(left) ? left : evaluateNode(node.right, scope);
		}
		case "compare":
			return compare(node.operator, evaluateNode(node.left, scope), evaluateNode(node.right, scope));
		case "call":
			return call(
				node.name,
				node.args.map((arg) => evaluateNode(arg, scope)),
				scope,
			);
	}
}

function property(target: ExpressionValue, name: string): ExpressionValue {
	if (target === null || typeof target !== "object" || Array.isArray(target)) {
		return null;
	}
	if (Object.prototype.hasOwnProperty.call(target, name)) {
		return target[name];
	}
	const lower = name.toLowerCase();
	const key = Object.keys(target).find((candidate) => candidate.toLowerCase() === lower);
	return key === undefined ? null : target[key];
}

function compare(operator: CompareOperator, left: ExpressionValue, right: ExpressionValue): boolean {
	switch (operator) {
		case "==":
			return looseEquals(left, right);
		case "!=":
			return !looseEquals(left, right);
	}
	if (typeof left === "string" && typeof right === "string") {
		const a = left.toLowerCase();
		const b = right.toLowerCase();
		return ordered(operator, a < b ? -1 : a > b ? 1 : 0);
	}
	const a = toNumber(left);
	const b = toNumber(right);
	if (Number.isNaN(a) || Number.isNaN(b)) {
		return false;
	}
	return ordered(operator, a - b);
}

function ordered(operator: Exclude<CompareOperator, "==" | "!=">, difference: number): boolean {
	switch (operator) {
		case "<":
			return difference < 0;
		case "<=":
			return difference <= 0;
		case ">":
			return difference > 0;
		case ">=":
			return difference >= 0;
	}
}

function looseEquals(left: ExpressionValue, right: ExpressionValue): boolean {
	if (left === null || right === null) {
		return left === right || toNumber(left) === toNumber(right);
	}
	if (typeof left === "object" || typeof right === "object") {
		return left === right;
	}
	if (typeof left === "string" && typeof right === "string") {
		return left.toLowerCase() === right.toLowerCase();
	}
	if (typeof left === typeof right) {
		return left === right;
	}
	return toNumber(left) === toNumber(right);
}

function toNumber(value: ExpressionValue): number {
	if (value === null) {
		return 0;
	}
	if (typeof value === "boolean") {
		return value ? 1 : 0;
	}
	if (typeof value === "number") {
		return value;
	}
	if (typeof value === "string") {
		const trimmed = value.trim();
		return trimmed.length === 0 ? 0 : Number(trimmed);
	}
	return Number.NaN;
}

function call(name: FunctionName, args: ExpressionValue[], scope: ExpressionScope): ExpressionValue {
	switch (name) {
		case "always":
			return true;
		case "success":
			return scope.status ? scope.status.success() : true;
		case "failure":
			return scope.status ? scope.status.failure() : false;
		case "cancelled":
			return scope.status ? scope.status.cancelled() : false;
		case "contains": {
			const [haystack, needle] = args;
			if (Array.isArray(haystack)) {
				return haystack.some((item) => looseEquals(item, needle));
			}
			return stringify(haystack).toLowerCase().includes(stringify(needle).toLowerCase());
		}
		case "startsWith":
			return stringify(args[0]).toLowerCase().startsWith(stringify(args[1]).toLowerCase());
		case "endsWith":
			return stringify(args[0]).toLowerCase().endsWith(stringify(args[1]).toLowerCase());
		case "format": {
			const [pattern, ...values] = args;
			return stringify(pattern).replace(/\{\{|\}\}|\{(\d+)\}/g, (token, position?: string) => {
				if (token === "{{") {
					return "{";
				}
				if (token === "}}") {
					return "}";
				}
				return stringify(values[Number(position)] ?? null);
			});
		}
		case "join": {
			const [items, separator] = args;
			const glue = separator === undefined ? "," : stringify(separator);
			return Array.isArray(items) ? items.map(stringify).join(glue) : stringify(items);
		}
		case "toJSON":
			return JSON.stringify(args[0] ?? null, null, 2);
	}
}

function staticPath(node: ExpressionNode): string[] | null {
	switch (node.kind) {
		case "context":
			return [node.name];
		case "member": {
			const parent = staticPath(node.object);
			return parent ? [...parent, node.property] : null;
		}
		case "index": {
			const parent = staticPath(node.object);
			if (!parent || node.index.kind !== "literal" || typeof node.index.value !== "string") {
				return null;
			}
			return [...parent, node.index.value];
		}
		default:
			return null;
	}
}

function walk(node: ExpressionNode, visit: (node: ExpressionNode) => void): void {
	visit(node);
	switch (node.kind) {
		case "member":
			walk(node.object, visit);
			break;
		case "index":
			walk(node.object, visit);
			walk(node.index, visit);
			break;
		case "not":
			walk(node.operand, visit);
			break;
		case "compare":
		case "logical":
			walk(node.left, visit);
			walk(node.right, visit);
			break;
		case "call":
			node.args.forEach((arg) => walk(arg, visit));
			break;
		default:
			break;
	}
}
