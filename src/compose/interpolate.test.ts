import { describe, it, expect } from "vitest";
import {
  InterpolationError,
  interpolateString,
  interpolateTree,
} from "./interpolate";

describe("interpolateString", () => {
  it("should expand plain and braced references", () => {
    expect(
      interpolateString("${HOST}:$PORT", { HOST: "db", PORT: "5432" }),
    ).toBe("db:5432");
  });

  it("should turn $$ into a literal dollar sign", () => {
    expect(interpolateString("echo $$HOME", { HOME: "/root" })).toBe(
      "echo $HOME",
    );
  });

  it("should leave a dollar sign without a name untouched", () => {
    expect(interpolateString("costs 5$ or $5", {})).toBe("costs 5$ or $5");
  });

  it("should expand unset variables to an empty string", () => {
    expect(interpolateString("v${MISSING}", {})).toBe("v");
  });

  it("should apply defaults for unset and empty values", () => {
    expect(interpolateString("${TAG:-latest}", {})).toBe("latest");
    expect(interpolateString("${TAG:-latest}", { TAG: "" })).toBe("latest");
    expect(interpolateString("${TAG-latest}", { TAG: "" })).toBe("");
    expect(interpolateString("${TAG-latest}", {})).toBe("latest");
  });

  it("should apply alternative values only when set", () => {
    expect(interpolateString("${DEBUG:+--verbose}", { DEBUG: "1" })).toBe(
      "--verbose",
    );
    expect(interpolateString("${DEBUG:+--verbose}", { DEBUG: "" })).toBe("");
    expect(interpolateString("${DEBUG+--verbose}", { DEBUG: "" })).toBe(
      "--verbose",
    );
  });

  it("should expand nested references in defaults", () => {
    expect(interpolateString("${A:-${B}}", { B: "b" })).toBe("b");
  });

  it("should fail on a missing required variable", () => {
    expect(() =>
      interpolateString("${DB_PASSWORD:?set it}", {}, "services.db.image"),
    ).toThrow(
      "services.db.image: required variable DB_PASSWORD is missing a value: set it",
    );
  });

  it("should accept an empty value with the ? form", () => {
    expect(interpolateString("${TOKEN?}", { TOKEN: "" })).toBe("");
    expect(() => interpolateString("${TOKEN:?}", { TOKEN: "" })).toThrow(
      InterpolationError,
    );
  });

  it("should reject an unterminated reference", () => {
    expect(() => interpolateString("${OOPS", {})).toThrow(
      "unterminated variable reference in '${OOPS'",
    );
  });

  it("should reject an invalid expression", () => {
    expect(() => interpolateString("${1BAD}", {})).toThrow(
      "invalid interpolation format for '${1BAD}'",
    );
  });
});

describe("interpolateTree", () => {
  it("should interpolate string values and keep keys and scalars", () => {
    const tree = {
      services: {
        web: { image: "nginx:${TAG}", ports: ["${PORT}:80"], tty: true },
      },
    };

    expect(interpolateTree(tree, { TAG: "1.25", PORT: "8080" })).toEqual({
      services: {
        web: { image: "nginx:1.25", ports: ["8080:80"], tty: true },
      },
    });
  });

  it("should report the path of the failing value", () => {
    const tree = { services: { web: { command: ["run", "${X:?needed}"] } } };

    expect(() => interpolateTree(tree, {})).toThrow(
      "services.web.command[1]: required variable X is missing a value: needed",
    );
  });
});
