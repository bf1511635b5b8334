import { Project } from "../compose/types";
import { CommandResult } from "./CommandResult";

export interface GlobalOptions {
  file?: string;
  projectName?: string;
  envFile?: string[];
  projectDirectory?: string;
  debug?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandOptions extends GlobalOptions {
  strict?: boolean;
  json?: boolean;
}

export interface CommandContext {
  project: Project;
  /** Selected service names; empty selects every service. */
  services: string[];
  options: CommandOptions;
}

export abstract class CommandHandler {
  abstract execute(context: CommandContext): Promise<CommandResult>;
}
