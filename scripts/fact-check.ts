/**
 * Fact-check CLI
 *
 * Usage:
 *   npx tsx scripts/fact-check.ts analyze --url <url> [--config <file>] [--fresh]
 *   npx tsx scripts/fact-check.ts analyze --text-file <path> [--title <title>] [--config <file>]
 *   npx tsx scripts/fact-check.ts history [--limit <n>]
 *   npx tsx scripts/fact-check.ts show <reportId>
 *
 * Needs an LLM key for the configured provider (e.g. GOOGLE_GENERATIVE_AI_API_KEY)
 * and search credentials (GOOGLE_CSE_API_KEY + GOOGLE_CSE_ID and/or NEWS_API_KEY).
 */

import * as fs from "fs";
import { parseArgs } from "util";
import { analyzeArticle, sqliteReportRepository, type AnalyzeInput } from "../src/lib/analysis-service";
import { createDefaultCollaborators } from "../src/lib/analyzer/collaborators";
import { clearDebugLog } from "../src/lib/analyzer/debug";
import { optimizeSearchQueries, toQueryList } from "../src/lib/analyzer/query-optimizer";
import { loadPipelineConfig, loadSearchConfig } from "../src/lib/config-loader";
import { ConfigValidationError } from "../src/lib/config-schemas";
import { formatAnalysisReport, formatReportListLine, formatStoredReport } from "../src/lib/report-format";
import { closeReportStore, getAnalyzedSources, getReport, listReports } from "../src/lib/report-store";
import { closeSearchCacheDb } from "../src/lib/search-cache";

const USAGE = `Usage:
  fact-check analyze --url <url> [--config <file>] [--search-config <file>] [--fresh]
  fact-check analyze --text-file <path> [--title <title>] [--config <file>]
  fact-check history [--limit <n>]
  fact-check show <reportId>`;

async function runAnalyze(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      url: { type: "string" },
      "text-file": { type: "string" },
      title: { type: "string" },
      config: { type: "string" },
      "search-config": { type: "string" },
      fresh: { type: "boolean", default: false },
    },
  });

  let input: AnalyzeInput;
  if (values.url) {
    input = { url: values.url, title: values.title ?? null };
  } else if (values["text-file"]) {
    input = { text: fs.readFileSync(values["text-file"], "utf-8"), title: values.title ?? null };
  } else {
    console.error("analyze needs --url or --text-file");
    return 2;
  }

  const pipeline = loadPipelineConfig({ filePath: values.config });
  const search = loadSearchConfig({ filePath: values["search-config"] });
  console.log(`[CLI] Pipeline config: ${pipeline.source}; search config: ${search.source}`);

  const pipelineConfig = pipeline.config;
  clearDebugLog();

  const result = await analyzeArticle(input, {
    config: pipelineConfig,
    collaborators: createDefaultCollaborators({ pipelineConfig, searchConfig: search.config }),
    optimizeQueries: async (hierarchy, attempt) =>
      toQueryList(await optimizeSearchQueries(hierarchy, attempt, { config: pipelineConfig }), pipelineConfig.maxQueries),
    store: sqliteReportRepository,
    reuseExisting: !values.fresh,
  });

  if (!result.ok) {
    console.error(`Analysis failed: ${result.error.message}`);
    return 1;
  }

  console.log("");
  console.log(formatAnalysisReport(result.report, result.reportId));
  if (result.merged) console.log(`\n(merged into existing report, merge #${result.mergeCount})`);
  return 0;
}

async function runHistory(args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: { limit: { type: "string", default: "20" } } });
  const limit = parseInt(values.limit, 10);
  const reports = await listReports({ limit: Number.isFinite(limit) ? limit : 20 });
  if (reports.length === 0) {
    console.log("No reports yet.");
    return 0;
  }
  for (const r of reports) console.log(formatReportListLine(r));
  return 0;
}

async function runShow(args: string[]): Promise<number> {
  const id = parseInt(args[0] ?? "", 10);
  if (!Number.isFinite(id)) {
    console.error("show needs a numeric report id");
    return 2;
  }
  const report = await getReport(id);
  if (!report) {
    console.error(`Report ${id} not found`);
    return 1;
  }
  console.log(formatStoredReport(report, await getAnalyzedSources(id)));
  return 0;
}

async function main(): Promise<number> {
  const [command, ...rest] = process.argv.slice(2);
  switch (command) {
    case "analyze":
      return runAnalyze(rest);
    case "history":
      return runHistory(rest);
    case "show":
      return runShow(rest);
    default:
      console.log(USAGE);
      return command === undefined || command === "--help" || command === "-h" ? 0 : 2;
  }
}

main()
  .then(async (code) => {
    await Promise.all([closeReportStore(), closeSearchCacheDb()]);
    process.exitCode = code;
  })
  .catch(async (err: unknown) => {
    if (err instanceof ConfigValidationError) {
      console.error(err.message);
    } else {
      console.error("Fatal:", err);
    }
    await Promise.all([closeReportStore(), closeSearchCacheDb()]);
    process.exitCode = 1;
  });
