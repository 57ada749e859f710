import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { ApiError, CloudApiClient, type InstanceTypeInfo } from "../lib/api";
import { buildCatalogRows, CATALOG_HEADERS, LIVE_HEADERS } from "../lib/catalog";
import { resolveConfig } from "../lib/config";
import { API_KEY_ENV } from "../lib/constants";
import { CliError } from "../lib/errors";
import { renderTable } from "../lib/table";

interface TypesOptions {
  live?: boolean;
}

export function registerTypesCommand(program: Command): void {
  program
    .command("types")
    .description("List known instance types and their regions")
    .option("--live", `Include current capacity and pricing (reads ${API_KEY_ENV})`)
    .action(async (options: TypesOptions) => {
      if (!options.live) {
        console.log(renderTable(CATALOG_HEADERS, buildCatalogRows()));
        return;
      }

      const config = resolveConfig();
      if (!config.apiKey) {
        throw new CliError({
          kind: "credential",
          message: "--live needs an API key.",
          hint: `Set ${API_KEY_ENV} and retry.`
        });
      }

      const client = new CloudApiClient({
        apiKey: config.apiKey,
        baseUrl: config.apiBaseUrl,
        onRequest: config.debug ? (method, url) => console.error(chalk.dim(`${method} ${url}`)) : undefined
      });
      const spinner = ora("Fetching instance types...").start();
      let live: Record<string, InstanceTypeInfo>;
      try {
        const response = await client.listInstanceTypes();
        if ("error" in response) {
          throw new ApiError(response.error);
        }
        live = response.data;
        spinner.stop();
      } catch (error) {
        spinner.fail("Could not fetch instance types.");
        throw error;
      }

      console.log(renderTable(LIVE_HEADERS, buildCatalogRows(live)));
    });
}
