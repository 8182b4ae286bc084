import { exec } from "child_process";
import { differenceInMilliseconds } from "date-fns";
import ms from "ms";
import { defer, from, Observable, of } from "rxjs";
import { catchError, concatMap, map, tap } from "rxjs/operators";
import { promisify } from "util";
import { formatError } from "../errors";
import createLogger from "../helpers/logger";
import { BuildPlan } from "./plan";

const log = createLogger("lighter.build.driver");

const execAsync = promisify(exec);

// package builds are chatty
const MAX_OUTPUT = 64 * 1024 * 1024;

export type BuildVariant = "native" | "container";

export type BuildStep = {
  variant: BuildVariant;
  package: string;
  version?: string;
  /** Full shell command line. */
  command: string;
  cwd: string;
};

export type StepResult = {
  step: BuildStep;
  ok: boolean;
  duration: number;
  error?: string;
};

export type CommandRunner = (command: string, cwd: string) => Promise<{ stdout: string; stderr: string }>;

export const execRunner: CommandRunner = (command, cwd) => execAsync(command, { cwd, encoding: "utf8", maxBuffer: MAX_OUTPUT });

const SAFE = /^[\w@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function commandLine(...parts: Array<string | undefined>): string {
  return parts.filter((part): part is string => part !== undefined && part.length > 0).join(" ");
}

function pair(plan: BuildPlan, pkg: string, version?: string): BuildStep[] {
  const option = version === undefined ? undefined : shellQuote(`${plan.versionOption}=${version}`);
  const mounted = `${plan.mountPoint.replace(/\/+$/, "")}/${pkg.replace(/^\.?\/+/, "")}`;
  return [
    {
      variant: "native",
      package: pkg,
      version,
      command: commandLine(plan.buildCommand, option, shellQuote(pkg)),
      cwd: plan.root,
    },
    {
      variant: "container",
      package: pkg,
      version,
      command: commandLine(plan.containerCommand, option, shellQuote(mounted)),
      cwd: plan.root,
    },
  ];
}

/**
 * Every build of a plan, in order: simple packages first, then each
 * interpreter version crossed with each interpreted package. Each build is
 * a native run followed by its containerized twin.
 */
export function planSteps(plan: BuildPlan): BuildStep[] {
  return [
    ...plan.simplePackages.flatMap((pkg) => pair(plan, pkg)),
    ...plan.interpreterVersions.flatMap((version) =>
      plan.interpretedPackages.flatMap((pkg) => pair(plan, pkg, version))
    ),
  ];
}

export function describeResult(result: StepResult): string {
  const status = result.ok ? "ok" : "failed";
  const line = `[${status}] ${result.step.command} (${ms(result.duration)})`;
  return result.error ? `${line}: ${result.error}` : line;
}

/**
 * Runs steps one after the other. A failing step is reported and the next
 * one still runs.
 */
export function runSteps$(steps: BuildStep[], runner: CommandRunner = execRunner): Observable<StepResult> {
  return from(steps).pipe(
    concatMap((step) => {
      const start = new Date();
      log.info("running %s (in %s)", step.command, step.cwd);

      return defer(() => from(runner(step.command, step.cwd))).pipe(
        tap(({ stdout, stderr }) => {
          if (stdout) log.debug("stdout: %s", stdout.trim());
          if (stderr) log.debug("stderr: %s", stderr.trim());
        }),
        map((): StepResult => ({ step, ok: true, duration: differenceInMilliseconds(new Date(), start) })),
        catchError((err: unknown) => {
          log.error("%s failed: %s", step.command, formatError(err));
          return of<StepResult>({
            step,
            ok: false,
            duration: differenceInMilliseconds(new Date(), start),
            error: formatError(err),
          });
        })
      );
    })
  );
}
