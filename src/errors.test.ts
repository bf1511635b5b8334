import { describe, it, expect } from "vitest";
import {
  CompatibilityCheckError,
  formatError,
  SecretFileReadError,
  ServicePlanError,
  SecretNotFoundError,
} from "./errors";

describe("errors", () => {
  it("should chain the cause into wrapped messages", () => {
    const cause = new SecretNotFoundError("db_password");
    const error = new ServicePlanError("api", cause);

    expect(error.message).toBe(
      "service 'api': secret 'db_password' not found in project secrets",
    );
    expect(error.cause).toBe(cause);
  });

  it("should keep the configured path on file read errors", () => {
    const error = new SecretFileReadError(
      "tls",
      "./certs/tls.pem",
      new Error("EACCES: permission denied"),
    );

    expect(error.message).toBe(
      "read secret from file './certs/tls.pem': EACCES: permission denied",
    );
  });

  it("should pluralise the strict check summary", () => {
    expect(new CompatibilityCheckError(1).message).toBe(
      "1 compatibility warning found (strict mode)",
    );
    expect(new CompatibilityCheckError(3).message).toBe(
      "3 compatibility warnings found (strict mode)",
    );
  });

  describe("formatError", () => {
    it("should name known errors by type", () => {
      expect(formatError(new SecretNotFoundError("x"))).toBe(
        "\u001B[31m\u001B[1m✗ SecretNotFound\u001B[0m\n\u001B[2msecret 'x' not found in project secrets\u001B[0m",
      );
    });

    it("should mark other errors as unexpected", () => {
      expect(formatError(new TypeError("bad"))).toBe(
        "\u001B[31m\u001B[1m✗ Unexpected Error: TypeError\u001B[0m\n\u001B[2mbad\u001B[0m",
      );
      expect(formatError("plain")).toBe(
        "\u001B[31m\u001B[1m✗ Unexpected Error: string\u001B[0m\n\u001B[2mplain\u001B[0m",
      );
    });

    it("should append the stack trace on request", () => {
      const error = new SecretNotFoundError("x");

      expect(formatError(error, true)).toContain(`\n\n\u001B[2m${error.stack}`);
    });
  });
});
