import yargs from "yargs/yargs";
import type { Elapsed, Value } from "../types";
import { iterFullStates } from "../recording/aggregate";
import { iterStateFile, iterUpdates } from "../recording/recordingReader";
import { rewriteRecordingFile } from "../recording/rewrite";

export type ReadStateArgs = {
  path: string;
  full: boolean;
  pretty: boolean;
  /** Output path for a copy with `narupa` renamed to `nanover` in keys. */
  narupa?: string;
};

export function parseReadStateArgs(argv: string[]): ReadStateArgs {
  const parsed = yargs(argv)
    .scriptName("read-state")
    .usage("$0 [options] <path>\n\nRead the shared state time series of a recording.")
    .option("full", {
      type: "boolean",
      default: false,
      description: "Display the aggregated state instead of the state updates.",
    })
    .option("pretty", {
      type: "boolean",
      default: false,
      description: "Display the state in a more human-readable way.",
    })
    .option("narupa", {
      type: "string",
      description: 'Write a new file where "narupa" is replaced by "nanover" in all keys.',
    })
    .demandCommand(1, 1, "Missing path to the file to read.", "Only one path can be read at a time.")
    .check((args) => {
      if (args.narupa !== undefined && (args.full || args.pretty)) {
        throw new Error("--narupa cannot be combined with --full or --pretty");
      }
      return true;
    })
    .strictOptions()
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .parseSync();

  return {
    path: String(parsed._[0]),
    full: parsed.full,
    pretty: parsed.pretty,
    narupa: parsed.narupa,
  };
}

export function formatRecord(elapsed: Elapsed, value: Record<string, Value>, pretty: boolean): string {
  if (pretty) {
    return `---- ${elapsed.toString()} ---------\n${JSON.stringify(value, null, 2)}`;
  }
  return `${elapsed.toString()} ${JSON.stringify(value)}`;
}

export type ReadStateResult =
  | { kind: "printed"; records: number }
  | { kind: "rewritten"; records: number; outputPath: string };

/**
 * Print updates or aggregated states, or write a renamed copy.
 * A bad header fails before anything is printed.
 */
export function readState(
  args: ReadStateArgs,
  write: (text: string) => void = console.log
): ReadStateResult {
  if (args.narupa !== undefined) {
    const records = rewriteRecordingFile(args.path, args.narupa, "narupa", "nanover");
    return { kind: "rewritten", records, outputPath: args.narupa };
  }

  const changes = iterStateFile(args.path);
  const stream = args.full ? iterFullStates(changes) : iterUpdates(changes);

  let records = 0;
  for (const [elapsed, value] of stream) {
    write(formatRecord(elapsed, value, args.pretty));
    records++;
  }
  return { kind: "printed", records };
}
