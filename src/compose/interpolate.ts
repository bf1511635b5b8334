export type Environment = Record<string, string | undefined>;

export class InterpolationError extends Error {
  constructor(
    public path: string,
    message: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "InterpolationError";
  }
}

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*/;
const BRACED_EXPRESSION = /^([A-Za-z_][A-Za-z0-9_]*)(?:(:?[-?+])([\s\S]*))?$/;

function findClosingBrace(input: string, from: number): number {
  let depth = 1;
  for (let i = from; i < input.length; i++) {
    if (input[i] === "$" && input[i + 1] === "{") {
      depth++;
      i++;
    } else if (input[i] === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function resolveExpression(
  expression: string,
  env: Environment,
  path: string,
): string {
  const match = BRACED_EXPRESSION.exec(expression);
  if (!match) {
    throw new InterpolationError(
      path,
      `invalid interpolation format for '\${${expression}}'`,
    );
  }

  const name = match[1];
  const operator: string | undefined = match[2];
  const argument = match[3] ?? "";
  const value = env[name];

  switch (operator) {
    case undefined:
      return value ?? "";
    case ":-":
      return value !== undefined && value !== ""
        ? value
        : interpolateString(argument, env, path);
    case "-":
      return value !== undefined
        ? value
        : interpolateString(argument, env, path);
    case ":?":
    case "?":
      if (value !== undefined && (operator === "?" || value !== "")) {
        return value;
      }
      throw new InterpolationError(
        path,
        `required variable ${name} is missing a value: ${interpolateString(argument, env, path)}`,
      );
    case ":+":
      return value !== undefined && value !== ""
        ? interpolateString(argument, env, path)
        : "";
    case "+":
      return value !== undefined ? interpolateString(argument, env, path) : "";
    default:
      throw new InterpolationError(
        path,
        `unsupported interpolation operator '${operator}'`,
      );
  }
}

/**
 * Expands `$VAR`, `${VAR}` and the `${VAR:-default}` family in a single
 * string. `$$` yields a literal dollar sign.
 */
export function interpolateString(
  input: string,
  env: Environment,
  path = "",
): string {
  let output = "";
  let i = 0;

  while (i < input.length) {
    const ch = input[i];
    if (ch !== "$") {
      output += ch;
      i++;
      continue;
    }

    const next = input[i + 1];
    if (next === "$") {
      output += "$";
      i += 2;
      continue;
    }

    if (next === "{") {
      const end = findClosingBrace(input, i + 2);
      if (end === -1) {
        throw new InterpolationError(
          path,
          `unterminated variable reference in '${input}'`,
        );
      }
      output += resolveExpression(input.slice(i + 2, end), env, path);
      i = end + 1;
      continue;
    }

    const name = VARIABLE_NAME.exec(input.slice(i + 1));
    if (name) {
      output += env[name[0]] ?? "";
      i += 1 + name[0].length;
      continue;
    }

    output += ch;
    i++;
  }

  return output;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Walks a parsed YAML tree and interpolates every string value. Mapping keys
 * are left alone; the result is a fresh tree.
 */
export function interpolateTree(
  value: unknown,
  env: Environment,
  path = "",
): unknown {
  if (typeof value === "string") {
    return interpolateString(value, env, path);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) =>
      interpolateTree(item, env, `${path}[${index}]`),
    );
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = interpolateTree(child, env, path ? `${path}.${key}` : key);
    }
    return result;
  }
  return value;
}
