import type { EntityRecord } from "@opsreport/shared";
import { friendlyCounterName, normalizeCounterPath, type CounterCatalog } from "./counters.js";
import type { CsvRecord } from "./csv.js";

export function buildCounterEntities(records: readonly CsvRecord[], catalog: CounterCatalog): EntityRecord[] {
  return records.map((record, index) => {
    const raw = record.Counter ?? "";
    const counter = normalizeCounterPath(raw);
    return {
      name: counter ? friendlyCounterName(catalog, counter) : `(unnamed counter, row ${index + 2})`,
      attributes: {
        counter_raw: raw,
        counter,
        Avg: record.Avg ?? "",
        Max: record.Max ?? "",
        Samples: record.Samples ?? ""
      }
    };
  });
}
