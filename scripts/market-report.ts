import { getArg, getDateArg, getIntegerArg, hasFlag } from "./lib/args";
import { MAX_CONCURRENCY, loadReportConfig } from "../src/market/config";
import { runMarketReport } from "../src/market/pipeline";

async function main() {
  const argv = process.argv.slice(2);
  const config = await loadReportConfig();
  const date = getDateArg(argv, config.report.timeZone);

  const res = await runMarketReport(
    {
      date,
      concurrency: getIntegerArg(argv, "concurrency", MAX_CONCURRENCY),
      outPath: getArg(argv, "out"),
      dryRun: hasFlag(argv, "dry-run")
    },
    { config }
  );
  console.log(JSON.stringify({ stage: "report", ...res }, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
