import "./_loadEnv";
import * as fs from "fs";
import { HEDGE_SUMMARY_PATH, SNAPSHOT_PATH } from "@/lib/paths";
import { errorMessage, isGatewayError } from "@/lib/errors";
import { loadSnapshot } from "@/lib/storage/snapshotStore";
import { extractSpotSeries } from "@/lib/hedge/inputs";
import { loadHedgeConfig } from "@/lib/hedge/config";
import { analyzeHedgeNecessity } from "@/lib/hedge/analyzer";
import { formatHedgeReport, hedgeSummaryCsv } from "@/lib/hedge/report";
import { parseFlag } from "./_utils/cli";

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const snapshotPath = parseFlag(argv, "snapshot") ?? SNAPSHOT_PATH;
  const summaryPath = parseFlag(argv, "summary") ?? HEDGE_SUMMARY_PATH;

  console.log(`Loading snapshot: ${snapshotPath}`);
  try {
    const snapshot = await loadSnapshot(snapshotPath);
    const { panel } = snapshot;
    console.log(`  Panel: ${panel.dates.length} x ${panel.columns.length}`);
    console.log(`  Contracts: ${Object.keys(snapshot.contract_info.contracts).length}`);

    const spot = extractSpotSeries(panel);
    console.log(`  Spot observations: ${spot.length}`);

    const config = loadHedgeConfig();
    const result = analyzeHedgeNecessity({
      spotPrices: spot.map((p) => p.value),
      panel,
      config,
    });

    formatHedgeReport(result, config).forEach((line) => console.log(line));

    await fs.promises.writeFile(summaryPath, hedgeSummaryCsv(result), "utf-8");
    console.log(`Summary written to ${summaryPath}`);
    return 0;
  } catch (error) {
    if (isGatewayError(error)) {
      console.error(`✗ ${error.message}`);
      if (error.code === "INVALID_SNAPSHOT") {
        console.error("Run `npm run preprocess` first to build the snapshot.");
      }
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(`Analysis failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
