import * as readline from "readline/promises";
import { createDefaultServices } from "./clients";
import { ResearchError, describeError } from "./research/errors";
import { ResearchProgressHandler } from "./research/progress-handler";
import { runResearch } from "./research/run";
import { createReport, saveReport } from "./report/report";
import { loadSettings } from "./shared/config/settings";
import { parsePeriod } from "./shared/utils/period";

/**
 * Interactive entry point: ask for objective, period and context, run the
 * research graph and save the report.
 */
async function main() {
  const settings = loadSettings();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log("=".repeat(60));
  console.log("  NEWS RESEARCH PIPELINE");
  console.log("=".repeat(60));

  const objective = (await rl.question("\nWhat are we researching today? > ")).trim();
  if (!objective) {
    rl.close();
    console.log("No objective provided. Exiting.");
    process.exitCode = 1;
    return;
  }

  const period = parsePeriod(await rl.question("What time period? (e.g. 2026-02-01 to 2026-02-27) > "));
  if (!period) {
    rl.close();
    console.log("Invalid period. Please provide start and end dates.");
    process.exitCode = 1;
    return;
  }

  const context = (await rl.question("(Optional) Any specific context? (e.g. sector, region, focus) > ")).trim();
  rl.close();

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\n🛑 Cancelling...");
    controller.abort();
  });

  const progress = new ResearchProgressHandler({ print: false, logFilePath: "research-events.log" });
  const request = { objective, ...period, context };

  try {
    const { digest } = await runResearch(request, {
      services: createDefaultServices(settings),
      settings: settings.pipeline,
      timeoutMs: settings.runTimeoutMs,
      signal: controller.signal,
      callbacks: [progress],
    });

    console.log(`\n${"=".repeat(60)}\nREPORT GENERATED\n${"=".repeat(60)}\n`);
    for (const section of digest.sections) {
      console.log(`>> ${section.title}`);
      console.log(`   ${section.article.slice(0, 150)}...`);
      console.log(`   External sources: ${section.sources.length}\n`);
    }

    const files = await saveReport(createReport(digest, request), settings.reportsDir);
    files.forEach((file) => console.log(`💾 Saved ${file}`));
  } finally {
    await progress.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ResearchError) {
    console.error(`\n❌ ${error.name} [${error.code}]: ${error.message}`);
  } else {
    console.error("\n❌ Unexpected error:", describeError(error));
  }
  process.exitCode = 1;
});
