#!/usr/bin/env node
import { readFileSync } from "fs";
import { resolve } from "path";
import { parseArgs } from "util";
import { z } from "zod";
import config from "./commands/config";
import groups from "./commands/groups";
import lights from "./commands/lights";
import scenes from "./commands/scenes";
import { CliIO, Command, CommandGroup, print } from "./commands/types";
import { formatError, UsageError } from "./errors";
import { setVerbosity } from "./helpers/logger";
import { createCradle, IServicesCradle } from "./services/cradle";

export const GROUPS: CommandGroup[] = [config, lights, groups, scenes];

const OPTIONS = {
  verbose: { type: "boolean", short: "v", multiple: true },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
  summary: { type: "boolean", short: "s" },
  "sort-name": { type: "boolean", short: "n" },
} as const;

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
};

const PackageSchema = z.object({ version: z.string() });

export function version(): string {
  const text = readFileSync(resolve(__dirname, "..", "package.json"), "utf8");
  return PackageSchema.parse(JSON.parse(text)).version;
}

/**
 * Exact names win, otherwise any unique prefix selects a group or command.
 */
export function findByPrefix<T extends { name: string }>(candidates: T[], input: string, what: string): T {
  const exact = candidates.find((candidate) => candidate.name === input);
  if (exact) {
    return exact;
  }
  const matches = candidates.filter((candidate) => candidate.name.startsWith(input));
  if (matches.length === 1) {
    return matches[0];
  }
  if (!matches.length) {
    throw new UsageError(`no such ${what} "${input}"`);
  }
  throw new UsageError(`${what} "${input}" is ambiguous: ${matches.map((m) => m.name).join(", ")}`);
}

function globalHelp(): string[] {
  return [
    "Usage: lighter [-v...] GROUP COMMAND [ARGS...]",
    "",
    "Configures lights, groups and scenes of a deCONZ gateway.",
    "",
    "Options:",
    "  -v, --verbose  Increases the output verbosity level, may be repeated",
    "  -h, --help     Shows this help message and exits",
    "  -V, --version  Prints the version and exits",
    "",
    "Groups:",
    ...GROUPS.map((group) => `  ${group.name.padEnd(8)} ${group.description}`),
  ];
}

function groupHelp(group: CommandGroup): string[] {
  return [
    `Usage: lighter ${group.name} COMMAND [ARGS...]`,
    "",
    `${group.description}.`,
    "",
    "Commands:",
    ...group.commands.map((command) => `  ${command.name.padEnd(8)} ${command.description}`),
  ];
}

function commandHelp(group: CommandGroup, command: Command): string[] {
  const flags = command.flags || [];
  return [
    `Usage: lighter ${group.name} ${command.name}${flags.length ? " [OPTIONS]" : ""}${command.usage ? ` ${command.usage}` : ""}`,
    "",
    `${command.description}.`,
    ...(flags.length ? ["", "Options:"] : []),
    ...(flags.includes("summary") ? ["  -s, --summary    Prints one line per resource instead of JSON"] : []),
    ...(flags.includes("sortName") ? ["  -n, --sort-name  Sorts by name instead of by identifier"] : []),
  ];
}

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err: unknown) {
    throw new UsageError(formatError(err));
  }
}

async function run(argv: readonly string[], io: CliIO, services: () => IServicesCradle): Promise<void> {
  const { values, positionals } = parse(argv);

  setVerbosity(values.verbose ? values.verbose.length : 0);

  if (values.version) {
    print(io, version());
    return;
  }

  const [groupName, commandName, ...args] = positionals;
  if (!groupName) {
    if (values.help) {
      print(io, globalHelp());
      return;
    }
    throw new UsageError("missing command, see lighter --help");
  }

  const group = findByPrefix(GROUPS, groupName, "group");
  if (!commandName) {
    if (values.help) {
      print(io, groupHelp(group));
      return;
    }
    throw new UsageError(`missing command, see lighter ${group.name} --help`);
  }

  const command = findByPrefix(group.commands, commandName, `${group.name} command`);
  if (values.help) {
    print(io, commandHelp(group, command));
    return;
  }

  const flags = { summary: values.summary === true, sortName: values["sort-name"] === true };
  const accepted = command.flags || [];
  for (const [flag, option] of [
    ["summary", "--summary"],
    ["sortName", "--sort-name"],
  ] as const) {
    if (flags[flag] && !accepted.includes(flag)) {
      throw new UsageError(`${group.name} ${command.name} does not take ${option}`);
    }
  }

  if (args.length < command.minArgs) {
    throw new UsageError(`lighter ${group.name} ${command.name} takes ${command.usage}`);
  }
  if (args.length > command.maxArgs) {
    throw new UsageError(`unexpected arguments: ${args.slice(command.maxArgs).join(" ")}`);
  }

  await command.run({ services: services(), io, args, flags });
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  io: CliIO = defaultIO,
  services: () => IServicesCradle = () => createCradle()
): Promise<number> {
  try {
    await run(argv, io, services);
    return 0;
  } catch (err: unknown) {
    io.stderr.write(`ERROR: ${formatError(err)}\n`);
    return err instanceof UsageError ? 2 : 1;
  }
}

if (require.main === module) {
  main().then((code) => {
    process.exitCode = code;
  });
}
