/**
 * Report Store
 *
 * SQLite persistence for articles, reports and per-source analyses.
 *
 * Tables:
 *   articles        url / content hash / title / text of the analyzed article
 *   reports         one row per report; merged re-analyses update the row
 *   source_analyses one row per analyzed source of a report
 *
 * @module report-store
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import crypto from "crypto";
import { z } from "zod";
import { aggregateComparison } from "./analyzer/comparison-aggregator";
import { buildFactHierarchy, toPromptShape } from "./analyzer/fact-hierarchy";
import type { ReportDetails } from "./analyzer/report-narrative";
import { markAnalyzed } from "./analyzer/source-lifecycle";
import type { AnalyzedSource, ComparisonVerdict, ConfidenceLevel, FactHierarchy } from "./analyzer/types";

// ============================================================================
// TYPES
// ============================================================================

export interface ArticleRecord {
  url: string | null;
  title: string | null;
  text: string;
}

export interface ReportInput {
  article: ArticleRecord;
  originalHierarchy: FactHierarchy;
  overallScore: number | null;
  confidenceLevel: ConfidenceLevel;
  sourcesConsidered: number;
  sourcesScored: number;
  sourcesFiltered: number;
  sourcesFailed: number;
  summary: string;
  recommendations: string;
  details: ReportDetails;
  mergeCount: number;
  analysisAttempts: number;
  analyzedSources: readonly AnalyzedSource[];
}

export interface StoredReport {
  id: number;
  articleId: number;
  articleUrl: string | null;
  articleTitle: string | null;
  contentHash: string;
  overallScore: number | null;
  confidenceLevel: ConfidenceLevel;
  sourcesConsidered: number;
  sourcesScored: number;
  sourcesFiltered: number;
  sourcesFailed: number;
  summary: string;
  recommendations: string;
  details: unknown;
  mergeCount: number;
  analysisAttempts: number;
  createdAt: string;
  updatedAt: string;
}

export interface StoredSourceAnalysis {
  url: string;
  domain: string;
  title: string;
  sourceType: string;
  query: string;
  relevanceScore: number;
  agreementRatio: number;
  matches: number;
  conflicts: number;
  lowSignal: boolean;
}

interface ReportRow {
  id: number;
  article_id: number;
  article_url: string | null;
  article_title: string | null;
  content_hash: string;
  overall_score: number | null;
  confidence_level: string;
  sources_considered: number;
  sources_scored: number;
  sources_filtered: number;
  sources_failed: number;
  summary: string;
  recommendations: string;
  details_json: string;
  merge_count: number;
  analysis_attempts: number;
  created_at: string;
  updated_at: string;
}

interface SourceAnalysisRow {
  url: string;
  domain: string;
  title: string;
  source_type: string;
  query: string;
  relevance_score: number;
  agreement_ratio: number;
  matches: number;
  conflicts: number;
  low_signal: number;
}

const ConfidenceSchema = z.enum(["high", "medium", "low"]);

const StoredHierarchySchema = z.object({
  sourceId: z.string(),
  shape: z.object({ what_facts: z.array(z.unknown()), claims: z.array(z.unknown()) }),
});

const StoredVerdictSchema = z.object({
  originalEntityId: z.string(),
  outcome: z.enum(["match", "conflict", "absent"]),
  matchedSourceEntityId: z.string().optional(),
  matchStrength: z.enum(["strong", "moderate"]).optional(),
  conflictType: z.enum(["contradiction", "partial_mismatch", "emphasis_difference", "context_mismatch"]).optional(),
  conflictSeverity: z.enum(["high", "medium", "low"]).optional(),
});

const StoredAnalysisSchema = z.object({
  factHierarchy: StoredHierarchySchema,
  verdicts: z.array(StoredVerdictSchema),
});

const SourceTypeSchema = z.enum(["official", "news", "blog", "social", "unknown"]);

// ============================================================================
// DATABASE SETUP
// ============================================================================

const DEFAULT_DB_PATH = "./corroborate-reports.db";

let db: Database | null = null;
let dbPromise: Promise<Database> | null = null;

export function getReportDbPath(): string {
  return process.env.CB_REPORT_DB_PATH || DEFAULT_DB_PATH;
}

async function getDb(): Promise<Database> {
  if (db) return db;
  if (!dbPromise) {
    dbPromise = (async () => {
      const configured = getReportDbPath();
      const dbPath = configured === ":memory:" ? configured : path.resolve(configured);
      console.log(`[Report-Store] Opening database at ${dbPath}`);

      const instance = await open({ filename: dbPath, driver: sqlite3.Database });
      await instance.exec("PRAGMA foreign_keys = ON");
      await instance.exec(`
        CREATE TABLE IF NOT EXISTS articles (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          url TEXT,
          content_hash TEXT NOT NULL,
          title TEXT,
          text TEXT NOT NULL,
          created_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS reports (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          article_id INTEGER NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
          overall_score REAL,
          confidence_level TEXT NOT NULL,
          sources_considered INTEGER NOT NULL,
          sources_scored INTEGER NOT NULL,
          sources_filtered INTEGER NOT NULL,
          sources_failed INTEGER NOT NULL,
          summary TEXT NOT NULL,
          recommendations TEXT NOT NULL,
          details_json TEXT NOT NULL,
          original_hierarchy_json TEXT NOT NULL,
          merge_count INTEGER NOT NULL DEFAULT 0,
          analysis_attempts INTEGER NOT NULL DEFAULT 1,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS source_analyses (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          report_id INTEGER NOT NULL REFERENCES reports(id) ON DELETE CASCADE,
          url TEXT NOT NULL,
          domain TEXT NOT NULL,
          title TEXT NOT NULL,
          source_type TEXT NOT NULL,
          query TEXT NOT NULL,
          relevance_score REAL NOT NULL,
          agreement_ratio REAL NOT NULL,
          matches INTEGER NOT NULL,
          conflicts INTEGER NOT NULL,
          low_signal INTEGER NOT NULL,
          analysis_json TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_articles_url ON articles(url);
        CREATE INDEX IF NOT EXISTS idx_articles_hash ON articles(content_hash);
        CREATE INDEX IF NOT EXISTS idx_reports_article ON reports(article_id);
        CREATE INDEX IF NOT EXISTS idx_source_analyses_report ON source_analyses(report_id);
      `);

      db = instance;
      return instance;
    })();
  }
  return dbPromise;
}

// ============================================================================
// HELPERS
// ============================================================================

export function hashContent(text: string): string {
  return crypto.createHash("sha256").update(text.trim()).digest("hex");
}

function serializeHierarchy(hierarchy: FactHierarchy): z.infer<typeof StoredHierarchySchema> {
  return { sourceId: hierarchy.sourceId, shape: toPromptShape(hierarchy) };
}

/** Rebuild a hierarchy; entity ids are positional, so they come back unchanged. */
function restoreHierarchy(json: unknown): FactHierarchy | null {
  const parsed = StoredHierarchySchema.safeParse(json);
  if (!parsed.success) return null;
  const built = buildFactHierarchy(parsed.data.shape, parsed.data.sourceId);
  return built.ok ? built.hierarchy : null;
}

function parseDetails(json: string): unknown {
  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch (err) {
    console.warn("[Report-Store] Unreadable details_json:", err);
    return {};
  }
}

function toStoredReport(row: ReportRow): StoredReport {
  return {
    id: row.id,
    articleId: row.article_id,
    articleUrl: row.article_url,
    articleTitle: row.article_title,
    contentHash: row.content_hash,
    overallScore: row.overall_score,
    confidenceLevel: ConfidenceSchema.catch("low").parse(row.confidence_level),
    sourcesConsidered: row.sources_considered,
    sourcesScored: row.sources_scored,
    sourcesFiltered: row.sources_filtered,
    sourcesFailed: row.sources_failed,
    summary: row.summary,
    recommendations: row.recommendations,
    details: parseDetails(row.details_json),
    mergeCount: row.merge_count,
    analysisAttempts: row.analysis_attempts,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const REPORT_SELECT = `
  SELECT r.*, a.url AS article_url, a.title AS article_title, a.content_hash AS content_hash
  FROM reports r JOIN articles a ON a.id = r.article_id
`;

async function insertSourceAnalyses(
  database: Database,
  reportId: number,
  sources: readonly AnalyzedSource[],
): Promise<void> {
  for (const s of sources) {
    await database.run(
      `INSERT INTO source_analyses
       (report_id, url, domain, title, source_type, query, relevance_score, agreement_ratio, matches, conflicts, low_signal, analysis_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        reportId,
        s.url,
        s.domain,
        s.title,
        s.sourceType,
        s.query,
        s.relevanceScore,
        s.agreement.agreementRatio,
        s.agreement.matches,
        s.agreement.conflicts,
        s.agreement.lowSignal ? 1 : 0,
        JSON.stringify({ factHierarchy: serializeHierarchy(s.factHierarchy), verdicts: s.verdicts }),
      ],
    );
  }
}

function reportValues(input: ReportInput): unknown[] {
  return [
    input.overallScore,
    input.confidenceLevel,
    input.sourcesConsidered,
    input.sourcesScored,
    input.sourcesFiltered,
    input.sourcesFailed,
    input.summary,
    input.recommendations,
    JSON.stringify(input.details),
    JSON.stringify(serializeHierarchy(input.originalHierarchy)),
    input.mergeCount,
    input.analysisAttempts,
  ];
}

// ============================================================================
// OPERATIONS
// ============================================================================

export async function saveReport(input: ReportInput): Promise<number> {
  const database = await getDb();
  const now = new Date().toISOString();

  await database.exec("BEGIN");
  try {
    const article = await database.run(
      "INSERT INTO articles (url, content_hash, title, text, created_at) VALUES (?, ?, ?, ?, ?)",
      [input.article.url, hashContent(input.article.text), input.article.title, input.article.text, now],
    );
    const report = await database.run(
      `INSERT INTO reports
       (overall_score, confidence_level, sources_considered, sources_scored, sources_filtered, sources_failed,
        summary, recommendations, details_json, original_hierarchy_json, merge_count, analysis_attempts,
        article_id, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [...reportValues(input), article.lastID, now, now],
    );
    const reportId = report.lastID;
    if (reportId === undefined) throw new Error("Report insert returned no id");

    await insertSourceAnalyses(database, reportId, input.analyzedSources);
    await database.exec("COMMIT");
    console.log(`[Report-Store] Saved report ${reportId} (${input.analyzedSources.length} analyzed source(s))`);
    return reportId;
  } catch (err) {
    await database.exec("ROLLBACK");
    throw err;
  }
}

/** Replace a report's scores and its source analyses (used after a merge). */
export async function updateReport(reportId: number, input: ReportInput): Promise<void> {
  const database = await getDb();
  const now = new Date().toISOString();

  await database.exec("BEGIN");
  try {
    const result = await database.run(
      `UPDATE reports SET
         overall_score = ?, confidence_level = ?, sources_considered = ?, sources_scored = ?,
         sources_filtered = ?, sources_failed = ?, summary = ?, recommendations = ?, details_json = ?,
         original_hierarchy_json = ?, merge_count = ?, analysis_attempts = ?, updated_at = ?
       WHERE id = ?`,
      [...reportValues(input), now, reportId],
    );
    if (!result.changes) throw new Error(`Report ${reportId} not found`);

    await database.run("DELETE FROM source_analyses WHERE report_id = ?", [reportId]);
    await insertSourceAnalyses(database, reportId, input.analyzedSources);
    await database.exec("COMMIT");
    console.log(`[Report-Store] Updated report ${reportId} (merge #${input.mergeCount})`);
  } catch (err) {
    await database.exec("ROLLBACK");
    throw err;
  }
}

export async function getReport(reportId: number): Promise<StoredReport | null> {
  const database = await getDb();
  const row = await database.get<ReportRow>(`${REPORT_SELECT} WHERE r.id = ?`, [reportId]);
  return row ? toStoredReport(row) : null;
}

/** Most recently updated report for an article URL. */
export async function findReportByUrl(url: string): Promise<StoredReport | null> {
  const database = await getDb();
  const row = await database.get<ReportRow>(`${REPORT_SELECT} WHERE a.url = ? ORDER BY r.updated_at DESC, r.id DESC LIMIT 1`, [
    url,
  ]);
  return row ? toStoredReport(row) : null;
}

export async function findReportByContentHash(contentHash: string): Promise<StoredReport | null> {
  const database = await getDb();
  const row = await database.get<ReportRow>(
    `${REPORT_SELECT} WHERE a.content_hash = ? ORDER BY r.updated_at DESC, r.id DESC LIMIT 1`,
    [contentHash],
  );
  return row ? toStoredReport(row) : null;
}

export async function listReports(options: { limit?: number; offset?: number } = {}): Promise<StoredReport[]> {
  const database = await getDb();
  const limit = Math.max(1, Math.min(options.limit ?? 20, 200));
  const offset = Math.max(0, options.offset ?? 0);
  const rows = await database.all<ReportRow[]>(`${REPORT_SELECT} ORDER BY r.created_at DESC, r.id DESC LIMIT ? OFFSET ?`, [
    limit,
    offset,
  ]);
  return rows.map(toStoredReport);
}

export async function getAnalyzedSources(reportId: number): Promise<StoredSourceAnalysis[]> {
  const database = await getDb();
  const rows = await database.all<SourceAnalysisRow[]>(
    `SELECT url, domain, title, source_type, query, relevance_score, agreement_ratio, matches, conflicts, low_signal
     FROM source_analyses WHERE report_id = ? ORDER BY id`,
    [reportId],
  );
  return rows.map((r) => ({
    url: r.url,
    domain: r.domain,
    title: r.title,
    sourceType: r.source_type,
    query: r.query,
    relevanceScore: r.relevance_score,
    agreementRatio: r.agreement_ratio,
    matches: r.matches,
    conflicts: r.conflicts,
    lowSignal: r.low_signal === 1,
  }));
}

export interface RestoredAnalysis {
  originalHierarchy: FactHierarchy;
  sources: AnalyzedSource[];
}

/**
 * Rebuild a report's original hierarchy and analyzed sources so a later run
 * can merge with them. Rows that no longer parse are skipped with a warning.
 */
export async function loadReportAnalysis(reportId: number): Promise<RestoredAnalysis | null> {
  const database = await getDb();
  const reportRow = await database.get<{ original_hierarchy_json: string }>(
    "SELECT original_hierarchy_json FROM reports WHERE id = ?",
    [reportId],
  );
  if (!reportRow) return null;

  const originalHierarchy = restoreHierarchy(parseDetails(reportRow.original_hierarchy_json));
  if (!originalHierarchy) {
    console.warn(`[Report-Store] Report ${reportId} has an unreadable original hierarchy`);
    return null;
  }

  const rows = await database.all<Array<SourceAnalysisRow & { analysis_json: string }>>(
    "SELECT * FROM source_analyses WHERE report_id = ? ORDER BY id",
    [reportId],
  );

  const sources: AnalyzedSource[] = [];
  for (const row of rows) {
    const analysis = StoredAnalysisSchema.safeParse(parseDetails(row.analysis_json));
    const hierarchy = analysis.success ? restoreHierarchy(analysis.data.factHierarchy) : null;
    if (!analysis.success || !hierarchy) {
      console.warn(`[Report-Store] Skipping unreadable source analysis for ${row.url}`);
      continue;
    }
    const verdicts: ComparisonVerdict[] = analysis.data.verdicts;
    const aggregated = aggregateComparison(originalHierarchy, hierarchy, verdicts);
    if (!aggregated.ok) {
      console.warn(`[Report-Store] Stored verdicts for ${row.url} no longer validate: ${aggregated.error.message}`);
      continue;
    }
    sources.push(
      markAnalyzed(
        {
          status: "pending",
          url: row.url,
          domain: row.domain,
          title: row.title,
          snippet: null,
          sourceType: SourceTypeSchema.catch("unknown").parse(row.source_type),
          query: row.query,
        },
        { relevanceScore: row.relevance_score, factHierarchy: hierarchy, verdicts, agreement: aggregated.agreement },
      ),
    );
  }

  return { originalHierarchy, sources };
}

export async function closeReportStore(): Promise<void> {
  const pending = dbPromise;
  db = null;
  dbPromise = null;
  if (pending) {
    const instance = await pending;
    await instance.close();
    console.log("[Report-Store] Database closed");
  }
}
