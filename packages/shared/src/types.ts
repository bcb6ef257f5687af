export type Severity = "failed" | "warning" | "stale" | "ok";

export type AttributeValue = string | number | boolean | null;

export interface EntityRecord {
  name: string;
  attributes: Readonly<Record<string, AttributeValue>>;
}

export interface ClassificationResult {
  name: string;
  severity: Severity;
  reason: string;
  ruleId: string;
  attributes: Readonly<Record<string, AttributeValue>>;
}

export interface RunMetadata {
  tool: string;
  title: string;
  generatedAt: string;
  host: string;
  ticket?: string;
  thresholds: Readonly<Record<string, unknown>>;
  notes?: string[];
}

export interface ReportSection {
  id: string;
  title: string;
  columns: string[];
  rows: string[][];
}

export interface ReportGroup {
  severity: Severity;
  results: ClassificationResult[];
}

export interface Report {
  metadata: RunMetadata;
  total: number;
  counts: Record<Severity, number>;
  groups: ReportGroup[];
  results: ClassificationResult[];
  sections: ReportSection[];
}

export interface RunSummary {
  outputDir: string;
  archivePath?: string;
  total: number;
  counts: Record<Severity, number>;
}
