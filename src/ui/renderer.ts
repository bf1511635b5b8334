import { createHash } from "crypto";
import { SecretMount } from "../api/secret";
import { DeploymentPlan } from "../compose/plan";
import { formatWarning, Warning } from "../compose/warnings";
import { logger } from "../utils/logger";

/**
 * Human output is coloured; machine output (JSON) never carries ANSI.
 * Secret payloads are never rendered, only their size and digest.
 */

export interface SecretMountRow {
  service: string;
  mount: SecretMount;
  /** Bytes. */
  size: number;
}

export interface SecretSummary {
  name: string;
  size: number;
  sha256: string;
}

export interface SecretMountJson {
  secretName: string;
  containerPath: string;
  uid?: string;
  gid?: string;
  /** Octal, e.g. `0440`. */
  mode?: string;
}

export interface SecretMountRowJson extends SecretMountJson {
  service: string;
  size: number;
}

export interface ServicePlanJson {
  name: string;
  image?: string;
  replicas: number;
  secrets: SecretSummary[];
  secretMounts: SecretMountJson[];
}

export interface DeploymentPlanJson {
  project: string;
  warnings: Warning[];
  services: ServicePlanJson[];
}

const ansi = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  dim: "\u001B[2m",
  cyan: "\u001B[36m",
  grey: "\u001B[90m",
} as const;

type Tone = "info" | "muted" | "accent";

function color(tone: Tone, text: string): string {
  switch (tone) {
    case "muted":
      return `${ansi.grey}${text}${ansi.reset}`;
    case "accent":
      return `${ansi.cyan}${text}${ansi.reset}`;
    case "info":
    default:
      return text;
  }
}

function bold(text: string): string {
  return `${ansi.bold}${text}${ansi.reset}`;
}

function dim(text: string): string {
  return `${ansi.dim}${text}${ansi.reset}`;
}

export function stripAnsi(s: string): string {
  return s.replace(/\u001B\[[0-9;]*m/g, "");
}

function header(title: string, subtitle?: string): string {
  const t = subtitle ? `${title} ${dim(`(${subtitle})`)}` : title;
  return color("accent", `== ${t} ==`);
}

/** Monospace table; cells may carry ANSI. */
function table(rows: string[][], padding = 2): string {
  if (rows.length === 0) return "";
  const widths: number[] = [];

  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, stripAnsi(cell).length);
    });
  }

  const pad = (s: string, w: number) => {
    const spaces = Math.max(0, w - stripAnsi(s).length + padding);
    return s + " ".repeat(spaces);
  };

  return rows
    .map((row) => row.map((cell, i) => pad(cell, widths[i])).join("").trimEnd())
    .join("\n");
}

export function formatMode(mode: number | undefined): string | undefined {
  return mode === undefined ? undefined : mode.toString(8).padStart(4, "0");
}

function sha256(content: Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

function mountToJson(mount: SecretMount): SecretMountJson {
  const json: SecretMountJson = {
    secretName: mount.secretName,
    containerPath: mount.containerPath,
  };
  if (mount.uid !== undefined) json.uid = mount.uid;
  if (mount.gid !== undefined) json.gid = mount.gid;
  const mode = formatMode(mount.mode);
  if (mode !== undefined) json.mode = mode;
  return json;
}

export const renderer = {
  log: {
    report(text: string): void {
      console.log(text);
    },
    success(message: string): void {
      logger.success(message);
    },
  },

  machine: {
    lines(texts: string[]): void {
      for (const text of texts) console.log(text);
    },
    json(data: unknown, pretty = false): void {
      console.log(pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data));
    },
  },

  warnings: {
    toLines(warnings: Warning[]): string[] {
      return warnings.map(formatWarning);
    },

    toJson(warnings: Warning[]): Warning[] {
      return warnings;
    },
  },

  secrets: {
    toText(project: string, rows: SecretMountRow[]): string {
      if (rows.length === 0) {
        return `${header("Secrets", project)}\n\n${dim("No secret mounts")}`;
      }

      const tableRows: string[][] = [
        [
          bold("SERVICE"),
          bold("SECRET"),
          bold("TARGET"),
          bold("UID"),
          bold("GID"),
          bold("MODE"),
          bold("SIZE"),
        ],
      ];
      for (const { service, mount, size } of rows) {
        tableRows.push([
          service,
          mount.secretName,
          mount.containerPath,
          mount.uid ?? color("muted", "-"),
          mount.gid ?? color("muted", "-"),
          formatMode(mount.mode) ?? color("muted", "-"),
          `${size}B`,
        ]);
      }

      return [header("Secrets", project), "", table(tableRows)].join("\n");
    },

    toJson(rows: SecretMountRow[]): SecretMountRowJson[] {
      return rows.map(({ service, mount, size }) => ({
        service,
        ...mountToJson(mount),
        size,
      }));
    },
  },

  plan: {
    toJson(plan: DeploymentPlan): DeploymentPlanJson {
      return {
        project: plan.project,
        warnings: plan.warnings,
        services: plan.services.map((service) => ({
          name: service.name,
          image: service.image,
          replicas: service.replicas,
          secrets: service.secrets.map((secret) => ({
            name: secret.name,
            size: secret.content.length,
            sha256: sha256(secret.content),
          })),
          secretMounts: service.secretMounts.map(mountToJson),
        })),
      };
    },
  },
};
