import { DeploymentPlan } from "../compose/plan";
import { Warning } from "../compose/warnings";
import { SecretMountRow } from "../ui/renderer";

export type CommandResult =
  | {
      kind: "check";
      warnings: Warning[];
      strict: boolean;
    }
  | {
      kind: "secrets";
      project: string;
      rows: SecretMountRow[];
    }
  | {
      kind: "plan";
      plan: DeploymentPlan;
    };
