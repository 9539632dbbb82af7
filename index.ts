#!/usr/bin/env node
import { CliParser, type CliOptions } from "./src/cli/parser";
import { Commands } from "./src/cli/commands";

async function main() {
  const args = process.argv.slice(2);

  let options: CliOptions;
  try {
    options = CliParser.parse(args);
  } catch (error) {
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    console.error(`${CliParser.usage()}\nRun with --help for all options.`);
    process.exit(1);
  }

  if (options.help) {
    CliParser.printHelp();
    process.exit(0);
  }

  try {
    const commands = new Commands();

    if (options.command === "compare") {
      await commands.compare(options);
    } else if (options.command === "window") {
      await commands.window(options);
    } else {
      await commands.analyze(options);
    }
  } catch (error) {
    console.error(
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(1);
  }
}

void main();
