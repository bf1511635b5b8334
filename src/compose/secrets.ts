import { readFileSync } from "fs";
import path from "path";
import { SecretMount, SecretSpec } from "../api/secret";
import { SecretDefinition, ServiceSecretReference } from "./types";
import {
  ExternalSecretError,
  SecretFileReadError,
  SecretNotFoundError,
} from "../errors";

export const DEFAULT_SECRETS_DIR = "/run/secrets";

export interface ResolvedSecrets {
  specs: SecretSpec[];
  mounts: SecretMount[];
}

function readSecretContent(
  secretName: string,
  file: string,
  workingDir: string,
): Buffer {
  const secretPath = path.isAbsolute(file) ? file : path.join(workingDir, file);
  try {
    return readFileSync(secretPath);
  } catch (error) {
    throw new SecretFileReadError(secretName, file, error);
  }
}

function buildSpec(
  definition: SecretDefinition,
  workingDir: string,
): SecretSpec {
  const { source } = definition;
  switch (source.kind) {
    case "external":
      throw new ExternalSecretError(definition.name);
    case "inline":
      return { name: definition.name, content: Buffer.from(source.content) };
    case "file":
      return {
        name: definition.name,
        content: readSecretContent(definition.name, source.path, workingDir),
      };
  }
}

function buildMount(reference: ServiceSecretReference): SecretMount {
  const mount: SecretMount = {
    secretName: reference.source,
    containerPath: reference.target
      ? reference.target
      : `${DEFAULT_SECRETS_DIR}/${reference.source}`,
  };
  if (reference.uid !== undefined) mount.uid = reference.uid;
  if (reference.gid !== undefined) mount.gid = reference.gid;
  if (reference.mode !== undefined) mount.mode = reference.mode;
  return mount;
}

/**
 * Turns one service's secret references into specs and mounts. File-backed
 * secrets are read relative to `workingDir`. The first failing reference
 * aborts the whole call; nothing partial is returned.
 *
 * A secret referenced twice yields two specs. Rejecting that is left to
 * validateSecretsAndMounts.
 */
export function resolveServiceSecrets(
  definitions: Readonly<Record<string, SecretDefinition>>,
  references: readonly ServiceSecretReference[],
  workingDir: string,
): ResolvedSecrets {
  const specs: SecretSpec[] = [];
  const mounts: SecretMount[] = [];

  for (const reference of references) {
    const definition = Object.prototype.hasOwnProperty.call(
      definitions,
      reference.source,
    )
      ? definitions[reference.source]
      : undefined;
    if (!definition) {
      throw new SecretNotFoundError(reference.source);
    }

    specs.push(buildSpec(definition, workingDir));
    mounts.push(buildMount(reference));
  }

  return { specs, mounts };
}
