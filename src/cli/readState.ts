#!/usr/bin/env -S npx tsx
import { hideBin } from "yargs/helpers";
import { parseReadStateArgs, readState } from "./readStateCommand";

async function main() {
  const args = parseReadStateArgs(hideBin(process.argv));
  const result = readState(args);

  if (result.kind === "rewritten") {
    // eslint-disable-next-line no-console
    console.error(`Wrote ${result.records} records to ${result.outputPath}`);
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
