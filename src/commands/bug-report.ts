import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { DEFAULT_BUG_REPORT_FILE, collectBugReport } from "../lib/bug-report";

interface BugReportCommandOptions {
  output: string;
  sudo: boolean;
}

export function registerBugReportCommand(program: Command): void {
  program
    .command("bug-report")
    .description("Collect GPU, driver and system diagnostics from this machine into a tar.gz archive")
    .option("-o, --output <path>", "Archive to write", DEFAULT_BUG_REPORT_FILE)
    .option("--sudo", "Run collectors that need root through sudo -n", false)
    .action(async (options: BugReportCommandOptions) => {
      console.log(chalk.yellow("The archive can contain sensitive data such as hostnames, addresses and system logs."));
      console.log(chalk.yellow("Review it before sharing it with anyone."));

      const spinner = ora("Collecting system information...").start();
      try {
        const result = await collectBugReport({
          outputPath: options.output,
          sudo: options.sudo,
          onProgress: (message) => {
            spinner.text = message;
          }
        });
        spinner.succeed(`Wrote ${result.archivePath}`);

        console.log(`Collected ${result.collected.length} item(s).`);
        if (result.skipped.length > 0) {
          console.log(chalk.yellow(`Skipped ${result.skipped.length} item(s):`));
          for (const item of result.skipped) {
            console.log(`  ${item.file}: ${item.reason}`);
          }
          if (!options.sudo) {
            console.log(chalk.dim("Re-run with --sudo to collect logs that need root."));
          }
        }
      } catch (error) {
        spinner.fail("Bug report failed.");
        throw error;
      }
    });
}
