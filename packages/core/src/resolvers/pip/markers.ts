import type { PipMarkerEnvironment } from "@prefetch/types";

import { ResolutionError } from "../../errors.js";
import { compareWithOperator } from "./pep440.js";

type Token =
  | { kind: "string"; value: string }
  | { kind: "variable"; value: string }
  | { kind: "op"; value: string }
  | { kind: "and" | "or" | "(" | ")" };

type Expression =
  | { kind: "compare"; left: Operand; op: string; right: Operand }
  | { kind: "and"; left: Expression; right: Expression }
  | { kind: "or"; left: Expression; right: Expression };

type Operand = { kind: "string"; value: string } | { kind: "variable"; value: string };

const VARIABLES = new Set([
  "python_version",
  "python_full_version",
  "os_name",
  "sys_platform",
  "platform_release",
  "platform_system",
  "platform_version",
  "platform_machine",
  "platform_python_implementation",
  "implementation_name",
  "implementation_version",
  "extra",
]);

const VERSION_VARIABLES = new Set(["python_version", "python_full_version", "implementation_version", "platform_release"]);

function tokenize(marker: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < marker.length) {
    const rest = marker.slice(index);
    const whitespace = /^\s+/.exec(rest);
    if (whitespace !== null) {
      index += whitespace[0].length;
      continue;
    }

    const first = rest[0];
    if (first === '"' || first === "'") {
      const close = rest.indexOf(first, 1);
      if (close < 0) {
        throw new ResolutionError(`Unterminated string in marker: ${marker}`);
      }
      tokens.push({ kind: "string", value: rest.slice(1, close) });
      index += close + 1;
      continue;
    }

    if (first === "(" || first === ")") {
      tokens.push({ kind: first });
      index += 1;
      continue;
    }

    const operator = /^(===|==|!=|<=|>=|~=|<|>|not\s+in\b|in\b)/.exec(rest);
    if (operator !== null) {
      tokens.push({ kind: "op", value: operator[0].replace(/\s+/, " ") });
      index += operator[0].length;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(rest);
    if (word !== null) {
      const value = word[0];
      if (value === "and" || value === "or") {
        tokens.push({ kind: value });
      } else if (VARIABLES.has(value.replace(/\./g, "_"))) {
        tokens.push({ kind: "variable", value: value.replace(/\./g, "_") });
      } else {
        throw new ResolutionError(`Unknown marker variable "${value}" in: ${marker}`);
      }
      index += value.length;
      continue;
    }

    throw new ResolutionError(`Cannot parse marker: ${marker}`);
  }

  return tokens;
}

/**
 * PEP 508 environment marker, parsed once and evaluated per environment.
 */
export class Marker {
  private readonly expression: Expression;

  constructor(readonly source: string) {
    const tokens = tokenize(source);
    let position = 0;

    const peek = (): Token | undefined => tokens[position];
    const next = (): Token => {
      const token = tokens[position];
      if (token === undefined) {
        throw new ResolutionError(`Unexpected end of marker: ${source}`);
      }
      position += 1;
      return token;
    };

    const operand = (): Operand => {
      const token = next();
      if (token.kind === "string" || token.kind === "variable") {
        return token;
      }
      throw new ResolutionError(`Expected a value in marker: ${source}`);
    };

    const atom = (): Expression => {
      if (peek()?.kind === "(") {
        next();
        const inner = or();
        if (next().kind !== ")") {
          throw new ResolutionError(`Unbalanced parentheses in marker: ${source}`);
        }
        return inner;
      }
      const left = operand();
      const op = next();
      if (op.kind !== "op") {
        throw new ResolutionError(`Expected an operator in marker: ${source}`);
      }
      return { kind: "compare", left, op: op.value, right: operand() };
    };

    const and = (): Expression => {
      let left = atom();
      while (peek()?.kind === "and") {
        next();
        left = { kind: "and", left, right: atom() };
      }
      return left;
    };

    const or = (): Expression => {
      let left = and();
      while (peek()?.kind === "or") {
        next();
        left = { kind: "or", left, right: and() };
      }
      return left;
    };

    this.expression = or();
    if (position !== tokens.length) {
      throw new ResolutionError(`Trailing tokens in marker: ${source}`);
    }
  }

  /**
   * True or false when decidable; null when a variable the marker needs is not in the environment.
   */
  evaluate(environment: PipMarkerEnvironment, extras: readonly string[] = []): boolean | null {
    return evaluateExpression(this.expression, environment, extras);
  }
}

function evaluateExpression(
  expression: Expression,
  environment: PipMarkerEnvironment,
  extras: readonly string[],
): boolean | null {
  if (expression.kind === "and") {
    const left = evaluateExpression(expression.left, environment, extras);
    const right = evaluateExpression(expression.right, environment, extras);
    if (left === false || right === false) {
      return false;
    }
    return left === null || right === null ? null : true;
  }
  if (expression.kind === "or") {
    const left = evaluateExpression(expression.left, environment, extras);
    const right = evaluateExpression(expression.right, environment, extras);
    if (left === true || right === true) {
      return true;
    }
    return left === null || right === null ? null : false;
  }

  const isExtra = expression.left.value === "extra" || expression.right.value === "extra";
  if (isExtra && (expression.left.kind === "variable" || expression.right.kind === "variable")) {
    const literal = expression.left.kind === "string" ? expression.left.value : expression.right.value;
    const present = extras.includes(literal);
    return expression.op === "!=" ? !present : expression.op === "==" ? present : null;
  }

  const left = resolveOperand(expression.left, environment);
  const right = resolveOperand(expression.right, environment);
  if (left === null || right === null) {
    return null;
  }

  const versionCompare =
    (expression.left.kind === "variable" && VERSION_VARIABLES.has(expression.left.value)) ||
    (expression.right.kind === "variable" && VERSION_VARIABLES.has(expression.right.value));

  switch (expression.op) {
    case "in":
      return right.includes(left);
    case "not in":
      return !right.includes(left);
    default:
      break;
  }

  if (versionCompare) {
    const result = compareWithOperator(left, expression.op, right);
    if (result !== null) {
      return result;
    }
  }

  switch (expression.op) {
    case "==":
    case "===":
      return left === right;
    case "!=":
      return left !== right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    default:
      throw new ResolutionError(`Operator ${expression.op} cannot compare "${left}" and "${right}"`);
  }
}

function resolveOperand(operand: Operand, environment: PipMarkerEnvironment): string | null {
  if (operand.kind === "string") {
    return operand.value;
  }
  return lookupVariable(environment, operand.value);
}

function lookupVariable(environment: PipMarkerEnvironment, name: string): string | null {
  switch (name) {
    case "python_version":
      return environment.python_version ?? (environment.python_full_version?.split(".").slice(0, 2).join(".") ?? null);
    case "python_full_version":
      return environment.python_full_version ?? null;
    case "sys_platform":
      return environment.sys_platform ?? null;
    case "platform_machine":
      return environment.platform_machine ?? null;
    case "platform_system":
      return environment.platform_system ?? null;
    case "platform_release":
      return environment.platform_release ?? null;
    case "os_name":
      return environment.os_name ?? null;
    case "implementation_name":
      return environment.implementation_name ?? null;
    case "platform_python_implementation":
      return environment.platform_python_implementation ?? null;
    default:
      return null;
  }
}
