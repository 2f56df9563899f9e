#!/usr/bin/env node
import { initializeConsoleLogging, setEnabledDebugLogging } from "./log";
import { initCli } from "./commands";

initializeConsoleLogging();

export async function main(argv: string[] = process.argv) {
  const program = initCli();
  const debug = argv.includes("--debug");
  setEnabledDebugLogging(debug);

  console.debug("The program has started with arguments", argv);
  try {
    await program.parseAsync(argv.filter(arg => arg !== "--"));
    process.exit(0);
  } catch (e: unknown) {
    if (debug) {
      console.error(e);
    } else {
      console.error(`Failed: ${e instanceof Error ? e.message : "Unknown error"}`);
    }
    process.exit(1);
  }
}

void main();
