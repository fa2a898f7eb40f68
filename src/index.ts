#!/usr/bin/env node
import { runApp } from "./app.js";
import { loadConfig } from "./config.js";
import { reportFatalError } from "./errors.js";
import { ansiPresenter, plainPresenter, ReadlineTerminal } from "./terminal.js";

async function main(): Promise<void> {
  const config = loadConfig();

  const terminal = new ReadlineTerminal({
    input: process.stdin,
    output: process.stdout,
    present: config.color ? ansiPresenter : plainPresenter,
  });
  process.once("SIGINT", () => {
    terminal.close();
    process.exit(130);
  });

  try {
    await runApp(config, terminal);
  } finally {
    terminal.close();
  }
}

main().catch((err: unknown) => {
  process.exitCode = reportFatalError(err);
});
