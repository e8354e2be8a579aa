import { WorkflowError } from "./errors.js";

export type ExpressionContext = {
	fields: Record<string, string | undefined>;
	status: {
		success: boolean;
		failure: boolean;
		cancelled: boolean;
	};
};

type Value = string | boolean;

type Token =
	| { type: "string"; value: string }
	| { type: "ident"; value: string }
	| { type: "op"; value: "!" | "&&" | "||" | "==" | "!=" | "(" | ")" | "," };

const STATUS_FUNCTIONS = new Set(["success", "failure", "always", "cancelled"]);

export function stripExpressionWrapper(expression: string): string {
	const trimmed = expression.trim();
	const match = trimmed.match(/^\$\{\{([\s\S]*)\}\}$/);
	return match ? match[1].trim() : trimmed;
}

export function hasStatusCheck(expression: string): boolean {
	return tokenize(stripExpressionWrapper(expression)).some(
		(token, index, tokens) =>
			token.type === "ident" &&
			STATUS_FUNCTIONS.has(token.value) &&
			tokens[index + 1]?.type === "op" &&
			tokens[index + 1]?.value === "(",
	);
}

/**
 * Evaluates a job or step condition. Conditions without a status function get
 * an implicit `success() &&` in front of them.
 */
export function evaluateCondition(expression: string | undefined, context: ExpressionContext): boolean {
	if (!expression || expression.trim().length === 0) {
		return context.status.success;
	}
	const body = stripExpressionWrapper(expression);
	const result = toBoolean(new Parser(tokenize(body), context).parse());
	if (hasStatusCheck(body)) {
		return result;
	}
	return context.status.success && result;
}

function tokenize(input: string): Token[] {
	const tokens: Token[] = [];
	let index = 0;
	while (index < input.length) {
		const char = input[index];
		if (/\s/.test(char)) {
			index += 1;
			continue;
		}
		if (char === "'" || char === '"') {
			let value = "";
			index += 1;
			while (index < input.length) {
				if (input[index] === char) {
					if (char === "'" && input[index + 1] === "'") {
						value += "'";
						index += 2;
						continue;
					}
					break;
				}
				value += input[index];
				index += 1;
			}
			if (index >= input.length) {
				throw new WorkflowError(`Unterminated string in expression: ${input}`);
			}
			index += 1;
			tokens.push({ type: "string", value });
			continue;
		}
		const two = input.slice(index, index + 2);
		if (two === "&&" || two === "||" || two === "==" || two === "!=") {
			tokens.push({ type: "op", value: two });
			index += 2;
			continue;
		}
		if (char === "!" || char === "(" || char === ")" || char === ",") {
			tokens.push({ type: "op", value: char });
			index += 1;
			continue;
		}
		const ident = input.slice(index).match(/^[A-Za-z_][A-Za-z0-9_.-]*/);
		if (ident) {
			tokens.push({ type: "ident", value: ident[0] });
			index += ident[0].length;
			continue;
		}
		throw new WorkflowError(`Unexpected character "${char}" in expression: ${input}`);
	}
	return tokens;
}

class Parser {
	private position = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly context: ExpressionContext,
	) {}

	parse(): Value {
		const value = this.parseOr();
		if (this.position < this.tokens.length) {
			throw new WorkflowError(`Unexpected token "${this.tokens[this.position].value}" in expression`);
		}
		return value;
	}

	private parseOr(): Value {
		let left = this.parseAnd();
		while (this.matchOp("||")) {
			const right = this.parseAnd();
			left = toBoolean(left) || toBoolean(right);
		}
		return left;
	}

	private parseAnd(): Value {
		let left = this.parseUnary();
		while (this.matchOp("&&")) {
			const right = this.parseUnary();
			left = toBoolean(left) && toBoolean(right);
		}
		return left;
	}

	private parseUnary(): Value {
		if (this.matchOp("!")) {
			return !toBoolean(this.parseUnary());
		}
		return this.parseComparison();
	}

	private parseComparison(): Value {
		const left = this.parsePrimary();
		if (this.matchOp("==")) {
			return compare(left, this.parsePrimary());
		}
		if (this.matchOp("!=")) {
			return !compare(left, this.parsePrimary());
		}
		return left;
	}

	private parsePrimary(): Value {
		const token = this.tokens[this.position];
		if (!token) {
			throw new WorkflowError("Unexpected end of expression");
		}
		if (token.type === "op" && token.value === "(") {
			this.position += 1;
			const value = this.parseOr();
			this.expectOp(")");
			return value;
		}
		if (token.type === "string") {
			this.position += 1;
			return token.value;
		}
		if (token.type === "ident") {
			this.position += 1;
			if (this.matchOp("(")) {
				return this.call(token.value, this.parseArguments());
			}
			return this.lookup(token.value);
		}
		throw new WorkflowError(`Unexpected token "${token.value}" in expression`);
	}

	private parseArguments(): Value[] {
		const args: Value[] = [];
		if (this.matchOp(")")) {
			return args;
		}
		do {
			args.push(this.parseOr());
		} while (this.matchOp(","));
		this.expectOp(")");
		return args;
	}

	private call(name: string, args: Value[]): Value {
		const text = args.map((arg) => toText(arg).toLowerCase());
		switch (name) {
			case "success":
				return this.context.status.success;
			case "failure":
				return this.context.status.failure;
			case "cancelled":
				return this.context.status.cancelled;
			case "always":
				return true;
			case "startsWith":
				return text[0]?.startsWith(text[1] ?? "") ?? false;
			case "endsWith":
				return text[0]?.endsWith(text[1] ?? "") ?? false;
			case "contains":
				return text[0]?.includes(text[1] ?? "") ?? false;
			default:
				throw new WorkflowError(`Unknown function in expression: ${name}()`);
		}
	}

	private lookup(name: string): Value {
		if (name === "true") {
			return true;
		}
		if (name === "false") {
			return false;
		}
		const key = name.replace(/^(github|trigger)\./, "");
		if (!(key in this.context.fields)) {
			throw new WorkflowError(`Unknown field in expression: ${name}`);
		}
		return this.context.fields[key] ?? "";
	}

	private matchOp(value: string): boolean {
		const token = this.tokens[this.position];
		if (token?.type === "op" && token.value === value) {
			this.position += 1;
			return true;
		}
		return false;
	}

	private expectOp(value: string): void {
		if (!this.matchOp(value)) {
			throw new WorkflowError(`Expected "${value}" in expression`);
		}
	}
}

function compare(left: Value, right: Value): boolean {
	if (typeof left === "boolean" || typeof right === "boolean") {
		return toBoolean(left) === toBoolean(right);
	}
	return left.toLowerCase() === right.toLowerCase();
}

function toBoolean(value: Value): boolean {
	return typeof value === "boolean" ? value : value.length > 0;
}

function toText(value: Value): string {
	return typeof value === "boolean" ? String(value) : value;
}
