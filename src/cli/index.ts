export { CommanderCli } from "./CommanderCli";
export type { CliOptions } from "./CommanderCli";
