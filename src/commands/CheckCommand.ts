import { CommandHandler, CommandContext } from "./CommandHandler";
import { CommandResult } from "./CommandResult";
import { selectServices } from "../compose/plan";
import { checkServiceWarnings } from "../compose/warnings";
import { logger } from "../utils/logger";

export class CheckCommand extends CommandHandler {
  async execute(context: CommandContext): Promise<CommandResult> {
    const { project, services, options } = context;
    const selected = selectServices(project, services);
    logger.debug(`Checking ${selected.length} service(s)`);

    const warnings = selected.flatMap((service) =>
      checkServiceWarnings(project, service),
    );
    return { kind: "check", warnings, strict: !!options.strict };
  }
}
