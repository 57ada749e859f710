import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import ora from "ora";
import { CloudApiClient, verifyApiKey } from "../lib/api";
import { getInstanceTypes, getRegionsForInstanceType } from "../lib/catalog";
import { parsePositiveInteger, parsePositiveNumber, resolveConfig, type LauncherConfig } from "../lib/config";
import { API_KEY_ENV } from "../lib/constants";
import { CliError } from "../lib/errors";
import {
  createLaunchRequest,
  expectValid,
  parseQuantity,
  promptValidator,
  validateChoice,
  validateInstanceType,
  validateRegion
} from "../lib/launch-request";
import { describeRegion, formatLaunchEvent, formatStopReason } from "../lib/launch-status";
import { runWithRetry, type StopReason } from "../lib/orchestrator";
import { formatList } from "../lib/utils";

interface LaunchOptions {
  pollInterval?: string;
  maxAttempts?: string;
  timeout?: string;
}

export function registerLaunchCommand(program: Command): void {
  program
    .command("launch", { isDefault: true })
    .description("Interactively launch GPU instances, retrying until capacity is available")
    .option("--poll-interval <seconds>", "Seconds to wait between capacity checks")
    .option("--max-attempts <n>", "Give up after this many launch attempts")
    .option("--timeout <seconds>", "Give up after waiting this long for capacity")
    .action(async (options: LaunchOptions) => {
      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        throw new CliError({
          kind: "validation",
          message: "launch is interactive and needs a terminal."
        });
      }

      const config = resolveConfig();
      const pollIntervalSeconds = options.pollInterval
        ? parsePositiveNumber(options.pollInterval, "--poll-interval")
        : config.pollIntervalSeconds;
      const maxAttempts = options.maxAttempts ? parsePositiveInteger(options.maxAttempts, "--max-attempts") : undefined;
      const timeoutMs = options.timeout ? parsePositiveNumber(options.timeout, "--timeout") * 1000 : undefined;

      const client = await promptForClient(config);

      const instanceTypes = getInstanceTypes();
      console.log(`\nAvailable instance types: ${formatList(instanceTypes)}\n`);
      const { instanceTypeInput } = await inquirer.prompt<{ instanceTypeInput: string }>([
        {
          type: "input",
          name: "instanceTypeInput",
          message: "Instance type:",
          validate: promptValidator(validateInstanceType)
        }
      ]);
      const instanceType = expectValid(validateInstanceType(instanceTypeInput));

      console.log(`\nAvailable regions for ${instanceType}: ${formatList(getRegionsForInstanceType(instanceType) ?? [])}`);
      console.log(chalk.dim("Leave empty to launch in whichever region has capacity."));
      const { regionInput } = await inquirer.prompt<{ regionInput: string }>([
        {
          type: "input",
          name: "regionInput",
          message: "Region name:",
          validate: promptValidator((input) => validateRegion(input, instanceType))
        }
      ]);
      const region = expectValid(validateRegion(regionInput, instanceType));

      const sshKeys = await client.listSshKeys();
      if (sshKeys.length === 0) {
        throw new CliError({
          kind: "not_found",
          message: "No SSH keys found on this account.",
          hint: "Add an SSH key in the cloud dashboard, then retry."
        });
      }
      console.log(`\nAvailable SSH keys: ${formatList(sshKeys)}`);
      const { sshKeyInput } = await inquirer.prompt<{ sshKeyInput: string }>([
        {
          type: "input",
          name: "sshKeyInput",
          message: "SSH key name:",
          validate: promptValidator((input) => validateChoice(input, sshKeys, "SSH key name"))
        }
      ]);
      const sshKeyName = expectValid(validateChoice(sshKeyInput, sshKeys, "SSH key name"));

      const fileSystemName = await promptForFileSystem(client);

      const { quantityInput } = await inquirer.prompt<{ quantityInput: string }>([
        {
          type: "input",
          name: "quantityInput",
          message: "Number of instances to launch (1-9):",
          default: "1",
          validate: promptValidator(parseQuantity)
        }
      ]);
      const quantity = expectValid(parseQuantity(quantityInput));

      const request = createLaunchRequest({ region, instanceType, sshKeyName, fileSystemName, quantity });

      console.log(chalk.cyan("\nLaunch summary"));
      console.log(`  Instance type: ${request.instanceType}`);
      console.log(`  Region: ${request.region || "any with capacity"}`);
      console.log(`  SSH key: ${request.sshKeyName}`);
      console.log(`  File system: ${request.fileSystemName ?? "none"}`);
      console.log(`  Quantity: ${request.quantity}`);
      console.log(chalk.dim("Press Ctrl+C to stop retrying."));

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once("SIGINT", onInterrupt);

      const stopped: { reason?: StopReason } = {};
      const spinner = ora(`Launching ${request.instanceType} in ${describeRegion(request.region)}...`).start();
      try {
        const outcome = await runWithRetry(client, request, {
          pollIntervalSeconds,
          maxAttempts,
          timeoutMs,
          signal: controller.signal,
          onEvent: (event) => {
            if (event.type === "stopped") {
              stopped.reason = event.reason;
            }
            spinner.text = formatLaunchEvent(event, request.instanceType);
          }
        });

        if (outcome.status === "success") {
          spinner.succeed(`Launched ${outcome.instanceIds.length} instance(s).`);
          console.log(`Instance IDs: ${formatList(outcome.instanceIds)}`);
          return;
        }

        if (outcome.status === "insufficient-capacity") {
          spinner.warn(`No capacity for ${request.instanceType}; ${stopped.reason ? formatStopReason(stopped.reason) : "stopped"}.`);
          process.exitCode = 1;
          return;
        }

        spinner.fail("Launch failed.");
        throw new CliError({
          kind: outcome.kind,
          message: `Error launching instance (${outcome.code}): ${outcome.message}`,
          hint: outcome.kind === "transport" ? "Check your network connection and retry." : undefined
        });
      } catch (error) {
        if (spinner.isSpinning) {
          spinner.fail("Launch failed.");
        }
        throw error;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }
    });
}

async function promptForClient(config: LauncherConfig): Promise<CloudApiClient> {
  const createClient = (apiKey: string): CloudApiClient =>
    new CloudApiClient({
      apiKey,
      baseUrl: config.apiBaseUrl,
      onRequest: config.debug ? (method, url) => console.error(chalk.dim(`${method} ${url}`)) : undefined
    });

  if (config.apiKey) {
    const client = createClient(config.apiKey);
    const verdict = await verifyApiKey(client);
    if (verdict !== true) {
      throw new CliError({
        kind: "credential",
        message: `The key in ${API_KEY_ENV} was rejected: ${verdict}`,
        hint: `Unset ${API_KEY_ENV} to enter a key interactively.`
      });
    }
    return client;
  }

  console.log("Paste in your Lambda API key.");
  console.log("If you do not have an API key you can generate one by clicking");
  console.log("'Generate API key' under 'API keys' in your Lambda Cloud dashboard.");

  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: "password",
      name: "apiKey",
      message: "API key:",
      mask: "*",
      validate: async (input: string) => {
        if (!input.trim()) {
          return "API key is required.";
        }
        return await verifyApiKey(createClient(input.trim()));
      }
    }
  ]);
  return createClient(apiKey.trim());
}

async function promptForFileSystem(client: CloudApiClient): Promise<string | undefined> {
  const { attach } = await inquirer.prompt<{ attach: boolean }>([
    {
      type: "confirm",
      name: "attach",
      message: "Attach a file system?",
      default: false
    }
  ]);
  if (!attach) {
    return undefined;
  }

  const fileSystems = await client.listFileSystems();
  if (fileSystems.length === 0) {
    console.log(chalk.yellow("No file systems found on this account; continuing without one."));
    return undefined;
  }

  console.log(`\nAvailable file systems: ${formatList(fileSystems)}`);
  const { fileSystemInput } = await inquirer.prompt<{ fileSystemInput: string }>([
    {
      type: "input",
      name: "fileSystemInput",
      message: "File system name:",
      validate: promptValidator((input) => validateChoice(input, fileSystems, "file system name"))
    }
  ]);
  return expectValid(validateChoice(fileSystemInput, fileSystems, "file system name"));
}
