import { parseTimestamp } from "@opsreport/reporting-engine";
import type { ReportSection } from "@opsreport/shared";
import type { CsvRecord } from "./csv.js";

export const EVENT_LEVELS = ["Critical", "Error", "Warning", "Information"] as const;

const NOISY_LEVELS = new Set<string>(["Critical", "Error", "Warning"]);

export type LevelCounts = Record<string, number>;

export function countByLevel(events: readonly CsvRecord[]): LevelCounts {
  const counts: LevelCounts = {};
  for (const event of events) {
    const level = event.LevelDisplayName?.trim() || "Unknown";
    counts[level] = (counts[level] ?? 0) + 1;
  }
  return counts;
}

function eventTime(event: CsvRecord): number | undefined {
  return parseTimestamp(event.TimeCreated)?.getTime();
}

// Parsable timestamps sort by instant; anything else falls back to text order.
function compareNewestFirst(a: CsvRecord, b: CsvRecord): number {
  const left = eventTime(a);
  const right = eventTime(b);
  if (left !== undefined && right !== undefined) {
    return right - left;
  }
  return (b.TimeCreated ?? "").trim().localeCompare((a.TimeCreated ?? "").trim());
}

export function newestNoisyEvents(events: readonly CsvRecord[], limit: number): CsvRecord[] {
  return events
    .filter((event) => NOISY_LEVELS.has(event.LevelDisplayName?.trim() ?? ""))
    .sort(compareNewestFirst)
    .slice(0, limit);
}

export function truncateMessage(message: string, maxLength: number): string {
  return message.length > maxLength ? `${message.slice(0, maxLength)}...` : message;
}

export function eventSummarySection(logs: ReadonlyArray<[string, readonly CsvRecord[]]>): ReportSection {
  return {
    id: "event-summary",
    title: "Event Summary",
    columns: ["Log", ...EVENT_LEVELS, "Other/Unknown", "Total"],
    rows: logs.map(([log, events]) => {
      const counts = countByLevel(events);
      const known = EVENT_LEVELS.map((level) => counts[level] ?? 0);
      const other = events.length - known.reduce((sum, count) => sum + count, 0);
      return [log, ...known.map(String), String(other), String(events.length)];
    })
  };
}

export function newestEventsSection(
  id: string,
  log: string,
  events: readonly CsvRecord[],
  limit: number,
  maxMessageLength: number
): ReportSection {
  return {
    id,
    title: `Newest ${log} (Critical/Error/Warning)`,
    columns: ["Time", "Level", "Provider", "EventID", "Message (truncated)"],
    rows: newestNoisyEvents(events, limit).map((event) => [
      event.TimeCreated ?? "",
      event.LevelDisplayName ?? "",
      event.ProviderName ?? "",
      event.EventID ?? "",
      truncateMessage(event.Message ?? "", maxMessageLength)
    ])
  };
}
