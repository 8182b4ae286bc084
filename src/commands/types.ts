import type { Writable } from "stream";
import { IServicesCradle } from "../services/cradle";

export type CliIO = {
  stdout: Writable;
  stderr: Writable;
};

export type Flag = "summary" | "sortName";

export type CommandContext = {
  services: IServicesCradle;
  io: CliIO;
  /** Positional arguments after the command name. */
  args: string[];
  flags: Record<Flag, boolean>;
};

export type Command = {
  name: string;
  /** Positional arguments as shown in the help, e.g. `ID [SCENE]`. */
  usage: string;
  description: string;
  minArgs: number;
  maxArgs: number;
  flags?: Flag[];
  run(context: CommandContext): Promise<void>;
};

export type CommandGroup = {
  name: string;
  description: string;
  commands: Command[];
};

export function print(io: CliIO, lines: string | string[]): void {
  for (const line of typeof lines === "string" ? [lines] : lines) {
    io.stdout.write(`${line}\n`);
  }
}
