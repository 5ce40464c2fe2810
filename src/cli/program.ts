import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { MagicPasswordManager } from "../api/MagicPasswordManager";
import { MPM_CONSTANTS } from "../constants";
import { MpmError, NotFoundError, ValidationError } from "../errors";
import { toRows } from "../store/EntryStore";
import type { Database } from "../types";
import { renderTable } from "./table";

export interface CliDeps {
  manager: MagicPasswordManager;
  /** Reads one secret; the answer must never be echoed. */
  prompt: (question: string) => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const PROMPTS = {
  MASTER: "Please enter master password: ",
  MASTER_NEW: "Please enter a master password for the new database: ",
  MASTER_REPEAT: "Please repeat the master password: "
} as const;

const MAX_CONFIRM_ATTEMPTS = 3;
const DATABASE_OPTION = ["-d, --database <name>", "database name (without file extension)"] as const;

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

async function askNewPassphrase(deps: CliDeps): Promise<string> {
  for (let attempt = 1; attempt <= MAX_CONFIRM_ATTEMPTS; attempt++) {
    const first = await deps.prompt(PROMPTS.MASTER_NEW);
    const second = await deps.prompt(PROMPTS.MASTER_REPEAT);
    if (first === second) return first;
    deps.stderr("The passwords did not match, please try again!\n");
  }
  throw new ValidationError(`The passwords did not match after ${MAX_CONFIRM_ATTEMPTS} attempts`);
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command()
    .name("mpm")
    .description("Magic Password Manager: Create and store passwords")
    .exitOverride()
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });

  const printTable = (database: Database) => deps.stdout(renderTable(toRows(database)) + "\n");

  program
    .command("list-db")
    .description("list available databases")
    .action(async () => {
      const names = await deps.manager.listDatabases();
      if (names.length === 0) {
        throw new NotFoundError(
          "No database files found. You can use the 'create-db' subcommand to create a database."
        );
      }
      deps.stdout(names.join("\n") + "\n");
    });

  program
    .command("create-db")
    .description("create an empty database")
    .requiredOption(...DATABASE_OPTION)
    .action(async (opts: { database: string }) => {
      const passphrase = await askNewPassphrase(deps);
      await deps.manager.createDatabase(opts.database, passphrase);
      deps.stdout("Database created successfully.\n");
    });

  program
    .command("open-db")
    .description("open and display a database")
    .requiredOption(...DATABASE_OPTION)
    .action(async (opts: { database: string }) => {
      const passphrase = await deps.prompt(PROMPTS.MASTER);
      printTable(await deps.manager.openDatabase(opts.database, passphrase));
    });

  program
    .command("delete-db")
    .description("delete a database")
    .requiredOption(...DATABASE_OPTION)
    .action(async (opts: { database: string }) => {
      await deps.manager.deleteDatabase(opts.database);
      deps.stdout("Database deleted successfully.\n");
    });

  program
    .command("add")
    .description("add entry to an existing database")
    .requiredOption(...DATABASE_OPTION)
    .requiredOption("-t, --title <title>", "title for password")
    .requiredOption("-u, --username <username>", "username used with password")
    .option(
      "-l, --password-length <length>",
      "length of the random password",
      parseInteger,
      MPM_CONSTANTS.GENERATOR.DEFAULT_LENGTH
    )
    .action(async (opts: { database: string; title: string; username: string; passwordLength: number }) => {
      const passphrase = await deps.prompt(PROMPTS.MASTER);
      printTable(
        await deps.manager.addEntry(opts.database, passphrase, {
          title: opts.title,
          username: opts.username,
          passwordLength: opts.passwordLength
        })
      );
    });

  program
    .command("remove")
    .description("remove entry from an existing database")
    .requiredOption(...DATABASE_OPTION)
    .requiredOption("-i, --index <index>", "index of entry to be removed", parseInteger)
    .action(async (opts: { database: string; index: number }) => {
      const passphrase = await deps.prompt(PROMPTS.MASTER);
      printTable(await deps.manager.removeEntry(opts.database, passphrase, opts.index));
    });

  return program;
}

/**
 * Runs one command line (without the node and script arguments).
 *
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  try {
    await createProgram(deps).parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    if (err instanceof MpmError) {
      deps.stderr(`Error: ${err.message}\n`);
      return 1;
    }
    deps.stderr(`Unexpected Error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}
