import path from "path";
import { SecretValidationError } from "../errors";

/** A secret object that can be mounted into containers. */
export interface SecretSpec {
  name: string;
  content: Buffer;
}

/** Where and how a secret is exposed inside one service's containers. */
export interface SecretMount {
  /** Name of a SecretSpec defined alongside this mount. */
  secretName: string;
  /** Absolute path inside the container. */
  containerPath: string;
  uid?: string;
  gid?: string;
  /** Permission bits; unset means the runtime default. */
  mode?: number;
}

// Ids must fit a signed 64-bit integer.
const MAX_ID = 2n ** 63n - 1n;

function parseId(value: string, label: "Uid" | "Gid"): bigint {
  if (!/^\d+$/.test(value)) {
    throw new SecretValidationError(
      `invalid ${label} '${value}': not a non-negative decimal integer`,
    );
  }
  const parsed = BigInt(value);
  if (parsed > MAX_ID) {
    throw new SecretValidationError(`invalid ${label} '${value}': value too high`);
  }
  return parsed;
}

export function getNumericUid(mount: SecretMount): bigint | undefined {
  if (mount.uid === undefined || mount.uid === "") return undefined;
  return parseId(mount.uid, "Uid");
}

export function getNumericGid(mount: SecretMount): bigint | undefined {
  if (mount.gid === undefined || mount.gid === "") return undefined;
  return parseId(mount.gid, "Gid");
}

export function validateSecretSpec(spec: SecretSpec): void {
  if (spec.name === "") {
    throw new SecretValidationError("secret name is required");
  }
}

export function validateSecretMount(mount: SecretMount): void {
  if (mount.secretName === "") {
    throw new SecretValidationError("secret mount source is required");
  }
  getNumericUid(mount);
  getNumericGid(mount);
  if (mount.containerPath !== "" && !path.posix.isAbsolute(mount.containerPath)) {
    throw new SecretValidationError("container path must be absolute");
  }
}

export function secretSpecsEqual(a: SecretSpec, b: SecretSpec): boolean {
  return a.name === b.name && a.content.equals(b.content);
}

function wrap(prefix: string, error: unknown): SecretValidationError {
  const reason = error instanceof Error ? error.message : String(error);
  return new SecretValidationError(`${prefix}: ${reason}`);
}

/**
 * Checks that spec names are present and unique, and that every mount is
 * well formed and points at one of the specs.
 */
export function validateSecretsAndMounts(
  secrets: readonly SecretSpec[],
  mounts: readonly SecretMount[],
): void {
  const names = new Set<string>();
  for (const secret of secrets) {
    try {
      validateSecretSpec(secret);
    } catch (error) {
      throw wrap("invalid secret", error);
    }
    if (names.has(secret.name)) {
      throw new SecretValidationError(`duplicate secret name: '${secret.name}'`);
    }
    names.add(secret.name);
  }

  for (const mount of mounts) {
    try {
      validateSecretMount(mount);
    } catch (error) {
      throw wrap("invalid secret mount", error);
    }
    if (!names.has(mount.secretName)) {
      throw new SecretValidationError(
        `secret mount source '${mount.secretName}' does not refer to any defined secret`,
      );
    }
  }
}
