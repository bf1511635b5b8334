export { CommandHandler } from "./CommandHandler";
export type {
  CommandContext,
  CommandOptions,
  GlobalOptions,
} from "./CommandHandler";
export type { CommandResult } from "./CommandResult";
export { CheckCommand } from "./CheckCommand";
export { SecretsCommand } from "./SecretsCommand";
export { PlanCommand } from "./PlanCommand";
