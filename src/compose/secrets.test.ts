import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, mkdirSync } from "fs";
import path from "path";
import { tmpdir } from "os";
import { DEFAULT_SECRETS_DIR, resolveServiceSecrets } from "./secrets";
import { SecretDefinition } from "./types";
import {
  ExternalSecretError,
  SecretFileReadError,
  SecretNotFoundError,
} from "../errors";

describe("resolveServiceSecrets", () => {
  let workingDir: string;

  beforeEach(() => {
    workingDir = mkdtempSync(path.join(tmpdir(), "meshplan-secrets-"));
  });

  afterEach(() => {
    rmSync(workingDir, { recursive: true, force: true });
  });

  const inline = (name: string, content: string): SecretDefinition => ({
    name,
    source: { kind: "inline", content },
  });

  it("should resolve inline content with the default target", () => {
    const { specs, mounts } = resolveServiceSecrets(
      { api_key: inline("api_key", "test-secret") },
      [{ source: "api_key" }],
      workingDir,
    );

    expect(specs).toEqual([
      { name: "api_key", content: Buffer.from("test-secret") },
    ]);
    expect(mounts).toEqual([
      { secretName: "api_key", containerPath: "/run/secrets/api_key" },
    ]);
    expect(DEFAULT_SECRETS_DIR).toBe("/run/secrets");
  });

  it("should read file secrets relative to the working directory", () => {
    mkdirSync(path.join(workingDir, "certs"));
    writeFileSync(path.join(workingDir, "certs", "tls.pem"), "test-cert\n");
    const absolute = path.join(workingDir, "token.txt");
    writeFileSync(absolute, "test-token");

    const { specs } = resolveServiceSecrets(
      {
        tls: { name: "tls", source: { kind: "file", path: "certs/tls.pem" } },
        token: { name: "token", source: { kind: "file", path: absolute } },
      },
      [{ source: "tls" }, { source: "token" }],
      workingDir,
    );

    expect(specs.map((s) => s.content.toString())).toEqual([
      "test-cert\n",
      "test-token",
    ]);
  });

  it("should copy target, uid, gid and mode onto the mount", () => {
    const { mounts } = resolveServiceSecrets(
      { db_password: inline("db_password", "test-secret") },
      [
        {
          source: "db_password",
          target: "/etc/db/password",
          uid: "999",
          gid: "999",
          mode: 0o400,
        },
      ],
      workingDir,
    );

    expect(mounts).toEqual([
      {
        secretName: "db_password",
        containerPath: "/etc/db/password",
        uid: "999",
        gid: "999",
        mode: 0o400,
      },
    ]);
  });

  it("should use the default target for an empty target", () => {
    const { mounts } = resolveServiceSecrets(
      { a: inline("a", "x") },
      [{ source: "a", target: "" }],
      workingDir,
    );

    expect(mounts[0].containerPath).toBe("/run/secrets/a");
  });

  it("should produce one spec per reference, duplicates included", () => {
    const { specs, mounts } = resolveServiceSecrets(
      { a: inline("a", "x") },
      [{ source: "a" }, { source: "a", target: "/etc/a" }],
      workingDir,
    );

    expect(specs).toHaveLength(2);
    expect(mounts.map((m) => m.containerPath)).toEqual([
      "/run/secrets/a",
      "/etc/a",
    ]);
  });

  it("should return empty lists for no references", () => {
    expect(resolveServiceSecrets({}, [], workingDir)).toEqual({
      specs: [],
      mounts: [],
    });
  });

  it("should reject a reference to an undefined secret", () => {
    expect(() =>
      resolveServiceSecrets({ a: inline("a", "x") }, [{ source: "b" }], workingDir),
    ).toThrow(new SecretNotFoundError("b"));
    expect(() =>
      resolveServiceSecrets({}, [{ source: "toString" }], workingDir),
    ).toThrow("secret 'toString' not found in project secrets");
  });

  it("should reject external secrets", () => {
    expect(() =>
      resolveServiceSecrets(
        { registry: { name: "registry", source: { kind: "external" } } },
        [{ source: "registry" }],
        workingDir,
      ),
    ).toThrow("external secrets are not supported: registry");
  });

  it("should report the configured path of an unreadable file", () => {
    const definitions: Record<string, SecretDefinition> = {
      tls: { name: "tls", source: { kind: "file", path: "missing.pem" } },
    };

    try {
      resolveServiceSecrets(definitions, [{ source: "tls" }], workingDir);
      throw new Error("Expected resolveServiceSecrets to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(SecretFileReadError);
      expect((error as Error).message).toMatch(
        /^read secret from file 'missing\.pem': ENOENT/,
      );
    }
  });

  it("should stop at the first failing reference", () => {
    expect(() =>
      resolveServiceSecrets(
        {
          ok: inline("ok", "x"),
          registry: { name: "registry", source: { kind: "external" } },
        },
        [{ source: "ok" }, { source: "registry" }, { source: "missing" }],
        workingDir,
      ),
    ).toThrow(ExternalSecretError);
  });
});
