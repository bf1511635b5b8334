import { Command } from "commander";
import {
  CheckCommand,
  CommandContext,
  CommandHandler,
  CommandOptions,
  PlanCommand,
  SecretsCommand,
} from "../commands";
import { Environment } from "../compose/interpolate";
import { loadProject } from "../compose/loader";
import { CompatibilityCheckError, ComposeFileNotFoundError } from "../errors";
import { renderCommandResult } from "../ui/commandResultRenderer";
import { resolveComposePath } from "../utils/findUp";
import { logger, LogLevel } from "../utils/logger";
import packageJson from "../../package.json";

type CommandName = "check" | "secrets" | "plan";

export interface CliOptions {
  /** Where the compose file search starts. Defaults to process.cwd(). */
  cwd?: string;
  /** Interpolation environment. Defaults to process.env. */
  env?: Environment;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export class CommanderCli {
  private program: Command;
  private commandHandlers: Map<CommandName, CommandHandler> = new Map();

  constructor(private cliOptions: CliOptions = {}) {
    this.program = new Command();
    this.setupCommandHandlers();
    this.setupProgram();
  }

  private setupCommandHandlers(): void {
    this.commandHandlers.set("check", new CheckCommand());
    this.commandHandlers.set("secrets", new SecretsCommand());
    this.commandHandlers.set("plan", new PlanCommand());
  }

  private setupProgram(): void {
    this.program
      .name("meshplan")
      .description(
        "Check Compose projects against the cluster and plan their secrets",
      )
      .version(packageJson.version);

    this.program
      .option("-f, --file <path>", "Compose file (searched upwards by default)")
      .option("-p, --project-name <name>", "Project name")
      .option(
        "--env-file <path>",
        "Env file for interpolation (repeatable)",
        collect,
        [],
      )
      .option("--project-directory <dir>", "Project working directory")
      .option("-v, --verbose", "Increase logging verbosity")
      .option("-q, --quiet", "Reduce logging output")
      .option("-d, --debug", "Enable debug logging");

    this.program
      .command("check")
      .alias("c")
      .description("List Compose features the cluster ignores")
      .argument("[services...]", "Services to check")
      .option("--strict", "Exit with an error when any warning is found")
      .option("-j, --json", "Output warnings as minified JSON")
      .action(async (services: string[], _options: unknown, command: Command) => {
        await this.executeCommand("check", services, command);
      });

    this.program
      .command("secrets")
      .description("Resolve and validate secret mounts without printing content")
      .argument("[services...]", "Services to resolve")
      .option("-j, --json", "Output mounts as minified JSON")
      .action(async (services: string[], _options: unknown, command: Command) => {
        await this.executeCommand("secrets", services, command);
      });

    this.program
      .command("plan")
      .description("Print the deployment plan as JSON")
      .argument("[services...]", "Services to plan")
      .option("-j, --json", "Output the plan as minified JSON")
      .action(async (services: string[], _options: unknown, command: Command) => {
        await this.executeCommand("plan", services, command);
      });
  }

  private configureLogging(options: CommandOptions): void {
    if (options.debug) {
      logger.setLevel(LogLevel.DEBUG);
    } else if (options.verbose) {
      logger.setLevel(LogLevel.INFO);
    } else if (options.quiet) {
      logger.setLevel(LogLevel.WARN);
    }
  }

  private async executeCommand(
    command: CommandName,
    services: string[],
    commandInstance: Command,
  ): Promise<void> {
    const options = commandInstance.optsWithGlobals<CommandOptions>();
    this.configureLogging(options);

    const cwd = this.cliOptions.cwd ?? process.cwd();
    const file = resolveComposePath(options.file, cwd);
    if (!file) {
      throw new ComposeFileNotFoundError(
        options.file ?? cwd,
        options.file
          ? `Compose file not found: ${options.file}`
          : `No compose file found in ${cwd} or any parent directory`,
      );
    }

    const project = loadProject({
      file,
      projectName: options.projectName,
      projectDirectory: options.projectDirectory,
      envFiles: options.envFile,
      env: this.cliOptions.env,
    });

    const handler = this.commandHandlers.get(command);
    if (!handler) {
      throw new Error(`No handler found for command: ${command}`);
    }

    const context: CommandContext = { project, services, options };
    const result = await handler.execute(context);
    renderCommandResult(result, { json: !!options.json });

    if (result.kind === "check" && result.strict && result.warnings.length > 0) {
      throw new CompatibilityCheckError(result.warnings.length);
    }
  }

  async parse(args: string[]): Promise<void> {
    await this.program.parseAsync(args);
  }

  getHelp(): string {
    return this.program.helpInformation();
  }
}
