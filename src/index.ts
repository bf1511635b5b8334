#!/usr/bin/env node

import { CommanderCli } from "./cli";
import { logger, LogLevel } from "./utils/logger";
import { formatError } from "./errors";

const cli = new CommanderCli();

async function main(): Promise<void> {
  try {
    await cli.parse(process.argv);
  } catch (error) {
    const showStackTrace = logger.getLevel() === LogLevel.DEBUG;
    console.error(formatError(error, showStackTrace));
    process.exit(1);
  }
}

void main();
