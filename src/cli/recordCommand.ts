import yargs from "yargs/yargs";
import { recordToFiles, type SessionResult } from "../live/liveRecorder";
import { DEFAULT_ADDRESS, DEFAULT_PORT, connectWsSession } from "../live/wsSession";
import { envFlag, envInt, envString, type Env } from "./env";

export type RecordArgs = {
  address: string;
  port: number;
  outfileStem: string;
  durable: boolean;
};

/**
 * Flags win over the environment, which wins over the built-in defaults.
 */
export function parseRecordArgs(argv: string[], env: Env = process.env): RecordArgs {
  const parsed = yargs(argv)
    .scriptName("record-session")
    .usage(
      "$0 [options] <outfile_stem>\n\nRecord the state updates to <stem>.state and the trajectory to <stem>.traj."
    )
    .option("address", {
      type: "string",
      default: envString(env, "RECORDER_ADDRESS", DEFAULT_ADDRESS),
      description: "Address of the server to record.",
    })
    .option("port", {
      type: "number",
      default: envInt(env, "RECORDER_PORT", DEFAULT_PORT),
      description: "Port of the server to record.",
    })
    .option("durable", {
      type: "boolean",
      default: envFlag(env, "RECORDER_DURABLE"),
      description: "Sync every frame to disk before receiving the next one.",
    })
    .demandCommand(1, 1, "Missing output file stem.", "Only one output file stem can be given.")
    .check((args) => {
      if (!Number.isInteger(args.port) || args.port < 1 || args.port > 65535) {
        throw new Error(`Invalid port: ${String(args.port)}`);
      }
      return true;
    })
    .strictOptions()
    .fail((msg, err) => {
      throw err ?? new Error(msg);
    })
    .parseSync();

  return {
    address: parsed.address,
    port: parsed.port,
    outfileStem: String(parsed._[0]),
    durable: parsed.durable,
  };
}

/**
 * Connect to the server and record both streams until they end or
 * `signal` aborts.
 */
export async function runRecord(args: RecordArgs, signal?: AbortSignal): Promise<SessionResult> {
  const session = await connectWsSession({ address: args.address, port: args.port });
  try {
    return await recordToFiles(session, args.outfileStem, {
      signal,
      durable: args.durable,
    });
  } finally {
    await session.close();
  }
}
