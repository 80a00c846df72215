#!/usr/bin/env node
import * as readline from "readline";
import { CliDeps, runBatch, runSingle } from "./cli";
import { loadConfig, toHttpOptions } from "./config";
import { AxiosPageFetcher } from "./core/fetcher";
import { createConsoleLogger } from "./core/logger";
import { getErrorMessage } from "./core/utils";

/**
 * Prompt the user interactively for a store URL via stdin.
 */
function promptForUrl(): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question("Enter store URL: ", (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function main(): Promise<void> {
  const config = loadConfig(process.argv.slice(2), process.env);
  const deps: CliDeps = {
    fetcher: new AxiosPageFetcher(toHttpOptions(config)),
    logger: createConsoleLogger(config.logLevel),
    print: (line) => console.log(line),
  };

  console.log("Storefront Insights v1.0\n");

  if (config.inputFile) {
    await runBatch(config, deps);
    return;
  }

  const url = config.storeUrl || (await promptForUrl());
  if (!url) {
    console.error("Error: No store URL provided.");
    process.exitCode = 1;
    return;
  }

  await runSingle(url, config, deps);
}

main().catch((err: unknown) => {
  console.error(`\n   Error: ${getErrorMessage(err)}`);
  process.exitCode = 1;
});
