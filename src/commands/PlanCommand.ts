import { CommandHandler, CommandContext } from "./CommandHandler";
import { CommandResult } from "./CommandResult";
import { planDeployment } from "../compose/plan";

export class PlanCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<CommandResult> {
    const { project, services } = context;
    return { kind: "plan", plan: planDeployment(project, { services }) };
  }
}
