#!/usr/bin/env -S npx tsx
import { hideBin } from "yargs/helpers";
import { recordingPaths } from "../live/liveRecorder";
import { parseRecordArgs, runRecord } from "./recordCommand";

async function main() {
  const args = parseRecordArgs(hideBin(process.argv));
  const paths = recordingPaths(args.outfileStem);

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  // eslint-disable-next-line no-console
  console.log(`Recording ws://${args.address}:${args.port} to ${paths.state} and ${paths.trajectory}`);

  const result = await runRecord(args, controller.signal);

  // eslint-disable-next-line no-console
  console.log(`Recorded ${result.state} state updates and ${result.trajectory} frames`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
