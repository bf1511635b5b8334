import { CommandHandler, CommandContext } from "./CommandHandler";
import { CommandResult } from "./CommandResult";
import { planService, selectServices } from "../compose/plan";
import { SecretMountRow } from "../ui/renderer";

export class SecretsCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<CommandResult> {
    const { project, services } = context;
    const rows: SecretMountRow[] = [];

    for (const service of selectServices(project, services)) {
      const plan = planService(project, service);
      for (const mount of plan.secretMounts) {
        const spec = plan.secrets.find((s) => s.name === mount.secretName);
        rows.push({
          service: service.name,
          mount,
          size: spec ? spec.content.length : 0,
        });
      }
    }

    return { kind: "secrets", project: project.name, rows };
  }
}
