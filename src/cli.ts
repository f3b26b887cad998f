#!/usr/bin/env node
import chalk from "chalk";
import * as readline from "readline";
import { createAgent } from "./agent";
import type { Agent } from "./agent";
import { createDefaultConfigIfMissing, DEFAULT_CONFIG_PATH, loadConfig } from "./config";
import { errorMessage } from "./errors";
import { ARGS_PROMPT, PROMPT, Shell } from "./shell";

function printHeader(): void {
  console.clear();
  console.log(chalk.cyan("╔═══════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan("║") + chalk.white("                        AutoDS                         ") + chalk.cyan("║"));
  console.log(chalk.cyan("║") + chalk.white("     Data science functions for JavaScript and R       ") + chalk.cyan("║"));
  console.log(chalk.cyan("╚═══════════════════════════════════════════════════════╝"));
  console.log();
  console.log("Tell me what data science task you'd like to perform,");
  console.log("and I'll find and run the right function for you.");
  console.log();
  console.log(chalk.yellow("Type 'exit' to quit, 'help' for more information."));
  console.log();
}

async function main(): Promise<number> {
  const configPath = process.env.AUTODS_CONFIG || DEFAULT_CONFIG_PATH;
  if (await createDefaultConfigIfMissing(configPath)) {
    console.log(chalk.yellow(`Created default config at ${configPath}`));
  }

  const configResult = await loadConfig(configPath);
  if (!configResult.success) {
    console.error(chalk.red(`Failed to load config from ${configPath}: ${configResult.error.issues.map(i => i.message).join(", ")}`));
    return 1;
  }
  const config = configResult.data;

  let agent: Agent;
  try {
    agent = await createAgent(config);
  } catch (error) {
    console.error(chalk.red(`Startup failed: ${errorMessage(error)}`));
    return 1;
  }

  agent.context.logger.info("Starting AutoDS CLI interface", { configPath });
  const shell = new Shell(agent, { write: text => process.stdout.write(text) }, { seedPath: config.catalog.seed });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const lines = rl[Symbol.asyncIterator]();

  const ask = async (prompt: string): Promise<string | undefined> => {
    rl.setPrompt(`${chalk.green(prompt)} `);
    rl.prompt();
    const next = await lines.next();
    return next.done ? undefined : next.value;
  };

  printHeader();

  for (;;) {
    const line = await ask(PROMPT);
    if (line === undefined) break;

    try {
      const step = await shell.command(line);
      if (step.type === "exit") break;
      if (step.type === "clear") printHeader();
      if (step.type !== "query") continue;

      console.log();
      console.log(chalk.yellow("Enter function arguments as JSON (or press Enter for none):"));
      const argsText = await ask(ARGS_PROMPT);
      if (argsText === undefined) break;
      await shell.query(step.query, argsText);
    } catch (error) {
      console.error(chalk.red(`Error: ${errorMessage(error)}`));
      agent.context.logger.error("Error in CLI", { error: errorMessage(error) });
    }
  }

  rl.close();
  agent.context.logger.info("AutoDS CLI interface closed");
  await agent.close();
  console.log(chalk.yellow("Thank you for using AutoDS!"));
  return 0;
}

main().then(
  code => process.exit(code),
  (error: unknown) => {
    console.error(chalk.red(`Fatal: ${errorMessage(error)}`));
    process.exit(1);
  },
);
