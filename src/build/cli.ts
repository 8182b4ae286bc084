#!/usr/bin/env node
import { lastValueFrom } from "rxjs";
import { tap, toArray } from "rxjs/operators";
import { parseArgs } from "util";
import { CliIO, print } from "../commands/types";
import { formatError, UsageError } from "../errors";
import { setVerbosity } from "../helpers/logger";
import { checkPlan } from "./check";
import { CommandRunner, describeResult, execRunner, planSteps, runSteps$ } from "./driver";
import { DEFAULT_PLAN, loadPlan } from "./plan";

const ACTIONS = ["run", "steps", "check"] as const;

type Action = (typeof ACTIONS)[number];

const OPTIONS = {
  plan: { type: "string", short: "p" },
  verbose: { type: "boolean", short: "v", multiple: true },
  help: { type: "boolean", short: "h" },
} as const;

const HELP = [
  "Usage: lighter-build [-v...] [--plan FILE] [run|steps|check]",
  "",
  "Builds the packages of a build plan, natively then in a container.",
  "",
  "Actions:",
  "  run    Runs every build step (default)",
  "  steps  Prints the build steps without running them",
  "  check  Checks the plan and its package descriptors",
  "",
  "Options:",
  `  -p, --plan FILE  Build plan to use (default: ${DEFAULT_PLAN})`,
  "  -v, --verbose    Increases the output verbosity level, may be repeated",
  "  -h, --help       Shows this help message and exits",
];

export type BuildCliOptions = {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
};

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
};

function isAction(value: string): value is Action {
  return ACTIONS.some((action) => action === value);
}

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err: unknown) {
    throw new UsageError(formatError(err));
  }
}

async function run(argv: readonly string[], io: CliIO, options: BuildCliOptions): Promise<number> {
  const { values, positionals } = parse(argv);
  setVerbosity(values.verbose ? values.verbose.length : 0);

  if (values.help) {
    print(io, HELP);
    return 0;
  }

  if (positionals.length > 1) {
    throw new UsageError(`unexpected arguments: ${positionals.slice(1).join(" ")}`);
  }
  const [action = "run"] = positionals;
  if (!isAction(action)) {
    throw new UsageError(`unknown action "${action}", use one of ${ACTIONS.join(", ")}`);
  }

  const plan = loadPlan(values.plan, { env: options.env });

  switch (action) {
    case "steps":
      print(io, planSteps(plan).map((step) => step.command));
      return 0;
    case "check": {
      const problems = checkPlan(plan);
      if (problems.length) {
        io.stderr.write(problems.map((problem) => `ERROR: ${problem}\n`).join(""));
        return 1;
      }
      print(io, `${plan.source} is consistent`);
      return 0;
    }
    case "run": {
      const results = await lastValueFrom(
        runSteps$(planSteps(plan), options.runner || execRunner).pipe(
          tap((result) => print(io, describeResult(result))),
          toArray()
        )
      );
      const failed = results.filter((result) => !result.ok).length;
      if (failed) {
        io.stderr.write(`ERROR: ${failed} of ${results.length} build steps failed\n`);
        return 1;
      }
      return 0;
    }
  }
}

export async function main(
  argv: readonly string[] = process.argv.slice(2),
  io: CliIO = defaultIO,
  options: BuildCliOptions = {}
): Promise<number> {
  try {
    return await run(argv, io, options);
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
