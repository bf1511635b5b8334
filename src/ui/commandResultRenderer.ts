import { CommandResult } from "../commands/CommandResult";
import { formatWarning } from "../compose/warnings";
import { logger } from "../utils/logger";
import { renderer } from "./renderer";

export interface RenderCommandResultOptions {
  json: boolean;
}

function toJsonPayload(result: CommandResult): unknown {
  switch (result.kind) {
    case "check":
      return renderer.warnings.toJson(result.warnings);
    case "secrets":
      return renderer.secrets.toJson(result.rows);
    case "plan":
      return renderer.plan.toJson(result.plan);
  }
}

export function renderCommandResult(
  result: CommandResult,
  options: RenderCommandResultOptions,
): void {
  if (options.json) {
    renderer.machine.json(toJsonPayload(result));
    return;
  }

  switch (result.kind) {
    case "check":
      if (result.warnings.length === 0) {
        renderer.log.success("No compatibility warnings");
      } else {
        renderer.machine.lines(renderer.warnings.toLines(result.warnings));
      }
      return;
    case "secrets":
      renderer.log.report(renderer.secrets.toText(result.project, result.rows));
      return;
    case "plan":
      // stdout carries only the plan so it can be piped
      for (const warning of result.plan.warnings) {
        logger.warn(formatWarning(warning));
      }
      renderer.machine.json(renderer.plan.toJson(result.plan), true);
      return;
  }
}
