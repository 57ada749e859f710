import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { resolveConfig } from "../lib/config";
import { runGpuCheck } from "../lib/gpu-check";

export function registerGpuCheckCommand(program: Command): void {
  program
    .command("gpu-check")
    .description("Verify every GPU on this machine is usable from PyTorch")
    .action(async () => {
      const config = resolveConfig();
      const spinner = ora("Testing GPU utilization...").start();
      const report = await runGpuCheck({ pythonBin: config.pythonBin });
      spinner.stop();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (!check.ok && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
      }

      console.log("");
      if (!report.ok) {
        console.log(chalk.red(report.summary));
        process.exitCode = 1;
        return;
      }
      console.log(chalk.green(report.summary));
    });
}
