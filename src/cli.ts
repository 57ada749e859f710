#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { registerBugReportCommand } from "./commands/bug-report";
import { registerGpuCheckCommand } from "./commands/gpu-check";
import { registerLaunchCommand } from "./commands/launch";
import { registerTypesCommand } from "./commands/types";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Launch GPU cloud instances as soon as capacity frees up, and check local GPU visibility")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerLaunchCommand(program);
registerTypesCommand(program);
registerGpuCheckCommand(program);
registerBugReportCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
