import { Writable } from "stream";
import { CliIO } from "../commands/types";

function sink(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
}

/**
 * Collects what a command prints.
 */
export function captureIO(): CliIO & { out: () => string; err: () => string } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout: sink(stdout),
    stderr: sink(stderr),
    out: () => stdout.join(""),
    err: () => stderr.join(""),
  };
}
