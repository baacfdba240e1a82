/**
 * Plain-text rendering of reports for the CLI.
 *
 * @module report-format
 */

import { formatScore } from "./analyzer/aggregation";
import type { AnalysisReport } from "./analyzer/fact-check-pipeline";
import type { StoredReport, StoredSourceAnalysis } from "./report-store";

function pct(ratio: number): string {
  return `${(ratio * 100).toFixed(0)}%`;
}

export function formatAnalysisReport(report: AnalysisReport, reportId: number | null = null): string {
  const { scored } = report;
  const lines: string[] = [];

  lines.push(`Report${reportId === null ? "" : ` #${reportId}`}: ${report.article.title ?? report.article.url ?? "(untitled)"}`);
  lines.push(`Score: ${formatScore(scored.overallScore)}/100  Confidence: ${scored.confidenceLevel}`);
  lines.push(
    `Sources: ${scored.sourcesConsidered} analyzed, ${scored.sourcesScored} scored, ` +
      `${scored.sourcesFiltered} filtered, ${scored.sourcesFailed} failed`,
  );
  lines.push("");
  lines.push(report.narrative.summary);
  lines.push(report.narrative.recommendations);

  if (scored.sources.length > 0) {
    lines.push("");
    lines.push("Per-source breakdown:");
    for (const s of scored.sources) {
      const flag = s.lowSignal ? " (low signal)" : "";
      lines.push(
        `  [${s.sourceType}] ${s.domain}  agreement ${pct(s.agreementRatio)}  relevance ${s.relevanceScore.toFixed(2)}  ` +
          `weight ${s.effectiveWeight.toFixed(2)}  +${s.matched.length}/-${s.conflicting.length}${flag}`,
      );
    }
  }

  const failed = report.sources.flatMap((s) => (s.status === "fetch_failed" ? [s] : []));
  if (failed.length > 0) {
    lines.push("");
    lines.push("Failed sources:");
    for (const s of failed) lines.push(`  ${s.url}  [${s.failure.category}] ${s.failure.message}`);
  }

  return lines.join("\n");
}

export function formatStoredReport(report: StoredReport, sources: readonly StoredSourceAnalysis[] = []): string {
  const lines = [
    `Report #${report.id}: ${report.articleTitle ?? report.articleUrl ?? "(untitled)"}`,
    `Score: ${formatScore(report.overallScore)}/100  Confidence: ${report.confidenceLevel}`,
    `Updated: ${report.updatedAt}  Merges: ${report.mergeCount}  Attempts: ${report.analysisAttempts}`,
    "",
    report.summary,
    report.recommendations,
  ];
  if (sources.length > 0) {
    lines.push("", "Analyzed sources:");
    for (const s of sources) {
      lines.push(`  [${s.sourceType}] ${s.url}  agreement ${pct(s.agreementRatio)}  +${s.matches}/-${s.conflicts}`);
    }
  }
  return lines.join("\n");
}

export function formatReportListLine(report: StoredReport): string {
  const score = formatScore(report.overallScore).padStart(5);
  return `#${report.id}  ${score}  ${report.confidenceLevel.padEnd(6)}  ${report.createdAt}  ${report.articleTitle ?? report.articleUrl ?? "(untitled)"}`;
}
