import { existsSync, readFileSync } from "fs";
import path from "path";
import { isMap, isScalar, parseDocument, ScalarTag } from "yaml";
import { parse as dotenvParse } from "dotenv";
import { expand } from "dotenv-expand";
import { ZodError } from "zod";
import { ComposeFileSchema } from "./schemas";
import { Environment, InterpolationError, interpolateTree } from "./interpolate";
import { deepFreeze, normalizeProject } from "./normalizer";
import { Project } from "./types";
import {
  ComposeFileNotFoundError,
  ComposeParseError,
  ComposeValidationError,
} from "../errors";
import { logger } from "../utils/logger";

export interface LoadProjectOptions {
  file: string;
  projectName?: string;
  /** Defaults to the directory containing the compose file. */
  projectDirectory?: string;
  /** Replaces the default `<project dir>/.env`. */
  envFiles?: string[];
  /** Defaults to process.env. */
  env?: Environment;
}

// Compose reads unquoted leading-zero integers (file modes like 0440) as octal
const legacyOctal: ScalarTag = {
  identify: (value) => typeof value === "number",
  default: true,
  tag: "tag:yaml.org,2002:int",
  format: "OCT",
  test: /^0[0-7]+$/,
  resolve: (str) => parseInt(str, 8),
};

function definedOnly(env: Environment): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Builds the interpolation environment. Env files are applied in order with
 * later files overriding earlier ones; the process environment wins over both.
 */
export function loadEnvironment(
  workingDir: string,
  envFiles: string[] | undefined,
  baseEnv: Environment,
): Record<string, string> {
  const base = definedOnly(baseEnv);

  let files: string[];
  if (envFiles && envFiles.length > 0) {
    files = envFiles.map((f) => path.resolve(workingDir, f));
    for (const file of files) {
      if (!existsSync(file)) {
        throw new ComposeFileNotFoundError(file, `Env file not found: ${file}`);
      }
    }
  } else {
    const defaultFile = path.join(workingDir, ".env");
    files = existsSync(defaultFile) ? [defaultFile] : [];
  }

  const fromFiles: Record<string, string> = {};
  for (const file of files) {
    logger.debug(`Reading env file ${file}`);
    const parsed = dotenvParse(readFileSync(file, "utf8"));

    // References resolve against the process env and earlier files
    const scope: Record<string, string> = { ...fromFiles, ...base };
    for (const key of Object.keys(parsed)) {
      if (base[key] === undefined) delete scope[key];
    }
    const expanded = expand({ parsed, processEnv: scope });
    if (expanded.error) {
      throw new ComposeParseError(file, expanded.error);
    }
    Object.assign(fromFiles, expanded.parsed ?? parsed);
  }

  return { ...fromFiles, ...base };
}

/**
 * Lowercases and strips everything outside `[a-z0-9_-]`, then drops leading
 * separators.
 */
export function normalizeProjectName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "")
    .replace(/^[_-]+/, "");
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${where}${issue.message}`;
  });
}

export function loadProject(options: LoadProjectOptions): Project {
  const filePath = path.resolve(options.file);
  if (!existsSync(filePath)) {
    throw new ComposeFileNotFoundError(filePath);
  }

  const workingDir = path.resolve(
    options.projectDirectory ?? path.dirname(filePath),
  );
  logger.debug(`Loading compose file ${filePath}`, { workingDir });

  const env = loadEnvironment(
    workingDir,
    options.envFiles,
    options.env ?? process.env,
  );

  const doc = parseDocument(readFileSync(filePath, "utf8"), {
    customTags: (tags) => [legacyOctal, ...tags],
  });
  if (doc.errors.length > 0) {
    throw new ComposeParseError(filePath, doc.errors[0]);
  }

  const services = doc.get("services");
  const serviceOrder = isMap(services)
    ? services.items.map((pair) =>
        String(isScalar(pair.key) ? pair.key.value : pair.key),
      )
    : [];
  logger.debug("Declared service order", serviceOrder);

  let interpolated: unknown;
  try {
    interpolated = interpolateTree(doc.toJS() ?? {}, env);
  } catch (error) {
    if (error instanceof InterpolationError) {
      throw new ComposeParseError(filePath, error);
    }
    throw error;
  }

  const result = ComposeFileSchema.safeParse(interpolated);
  if (!result.success) {
    throw new ComposeValidationError(formatZodIssues(result.error));
  }

  const name = normalizeProjectName(
    options.projectName ??
      env.COMPOSE_PROJECT_NAME ??
      result.data.name ??
      path.basename(workingDir),
  );
  if (name === "") {
    throw new ComposeValidationError([
      "name: project name must contain at least one letter or digit",
    ]);
  }

  const project = normalizeProject(result.data, {
    name,
    workingDir,
    serviceOrder,
    env,
  });
  return deepFreeze(project);
}
