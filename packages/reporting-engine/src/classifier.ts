import { InputError, type AttributeValue, type ClassificationResult, type EntityRecord, type Severity } from "@opsreport/shared";

export interface ClassificationContext<T> {
  now: Date;
  thresholds: T;
}

/**
 * One entry of an ordered rule list. `match` returns the reason when the rule
 * applies and undefined otherwise. It may throw InputError for a value it
 * cannot interpret; the row is then reported as failed.
 */
export interface Rule<T> {
  id: string;
  severity: Severity;
  match: (entity: EntityRecord, context: ClassificationContext<T>) => string | undefined;
}

export const MALFORMED_INPUT_RULE = "malformed-input";
export const NO_MATCH_RULE = "no-match";

export function okRule<T>(reason: string, id = "ok"): Rule<T> {
  return { id, severity: "ok", match: () => reason };
}

export function classify<T>(
  entity: EntityRecord,
  rules: readonly Rule<T>[],
  context: ClassificationContext<T>
): ClassificationResult {
  for (const rule of rules) {
    const reason = rule.match(entity, context);
    if (reason !== undefined) {
      return {
        name: entity.name,
        severity: rule.severity,
        reason,
        ruleId: rule.id,
        attributes: entity.attributes
      };
    }
  }
  return {
    name: entity.name,
    severity: "ok",
    reason: "No rule matched",
    ruleId: NO_MATCH_RULE,
    attributes: entity.attributes
  };
}

export function classifyAll<T>(
  entities: readonly EntityRecord[],
  rules: readonly Rule<T>[],
  context: ClassificationContext<T>
): ClassificationResult[] {
  return entities.map((entity) => {
    try {
      return classify(entity, rules, context);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      return {
        name: entity.name,
        severity: "failed",
        reason: `Malformed input: ${error.message}`,
        ruleId: MALFORMED_INPUT_RULE,
        attributes: entity.attributes
      };
    }
  });
}

export function textAttribute(entity: EntityRecord, key: string): string {
  const value: AttributeValue | undefined = entity.attributes[key];
  if (value === null || value === undefined) {
    return "";
  }
  return String(value).trim();
}

/** Returns undefined for an absent or empty value; throws InputError for a non-numeric one. */
export function numberAttribute(entity: EntityRecord, key: string): number | undefined {
  const value = entity.attributes[key];
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InputError(`${key} is not a finite number: ${value}`);
    }
    return value;
  }
  const text = String(value).trim();
  if (text === "") {
    return undefined;
  }
  const numeric = Number(text);
  if (typeof value === "boolean" || !Number.isFinite(numeric)) {
    throw new InputError(`${key} is not a number: "${text}"`);
  }
  return numeric;
}
