#!/usr/bin/env node
import { MagicPasswordManager } from "../api/MagicPasswordManager";
import { LogRing, formatLogEntry } from "../diagnostics/LogRing";
import { resolveCliConfig } from "./config";
import { runCli } from "./program";
import { PassphrasePrompt } from "./prompt";

async function main(): Promise<number> {
  const config = resolveCliConfig(process.env, process.cwd());
  const logger = config.logLevel
    ? new LogRing({
        level: config.logLevel,
        sink: (entry) => process.stderr.write(formatLogEntry(entry) + "\n")
      })
    : new LogRing();

  const prompt = new PassphrasePrompt();
  try {
    return await runCli(process.argv.slice(2), {
      manager: new MagicPasswordManager({ directory: config.directory, logger }),
      prompt: (question) => prompt.ask(question),
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text)
    });
  } finally {
    prompt.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  }
);
