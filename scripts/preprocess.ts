import "./_loadEnv";
import { DATA_ROOT, SNAPSHOT_PATH } from "@/lib/paths";
import { preprocessDirectory, type PreprocessResult } from "@/lib/gateway";
import { errorMessage, isGatewayError } from "@/lib/errors";
import { saveSnapshot } from "@/lib/storage/snapshotStore";
import { formatQualityReport } from "@/lib/validation/quality";
import { parsePreprocessArgs } from "./_utils/cli";

async function main(): Promise<number> {
  const args = parsePreprocessArgs(process.argv.slice(2), { dir: DATA_ROOT, output: SNAPSHOT_PATH });
  const rule = "=".repeat(70);

  console.log(rule);
  console.log("Preprocess");
  console.log(rule);
  console.log(`\n[1] Scanning ${args.dir}${args.recursive ? " (recursive)" : ""}...`);

  let result: PreprocessResult;
  try {
    result = await preprocessDirectory(args.dir, { recursive: args.recursive });
  } catch (error) {
    if (isGatewayError(error)) {
      console.error(`\n✗ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const { stats, panel, snapshot } = result;
  console.log(`\nLoaded: ${stats.spot_count} spot, ${stats.futures_count} futures`);
  for (const e of stats.errors) {
    console.log(`  ${e.file}: [${e.code}] ${e.message}`);
  }

  console.log("\n[2] Unified panel");
  console.log(`  Shape: ${panel.dates.length} x ${panel.columns.length}`);
  console.log(`  Date range: ${panel.dates[0]} to ${panel.dates[panel.dates.length - 1]}`);
  console.log(`  Contracts: ${Object.keys(snapshot.contract_info.contracts).length}`);

  formatQualityReport(snapshot.quality_report).forEach((line) => console.log(line));

  console.log(`\n[3] Saving snapshot to ${args.output}`);
  const written = await saveSnapshot(args.output, snapshot);
  console.log(`  Panel CSV: ${written.panelCsv}`);
  console.log(`\n✓ Preprocessing complete`);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(`Preprocessing failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
