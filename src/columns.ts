import { SchemaError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { RuleSet } from "./types.js";

const log = createLogger("columns");

export interface ResolvedColumns {
  // header position -> canonical column (undefined: ignored or empty header cell)
  byIndex: Array<string | undefined>;
  indexOf: ReadonlyMap<string, number>;
  ignored: string[];
}

/**
 * Map a raw header row to canonical columns.
 *
 * Lookup order per cell: rename map, ignore list, qualified name. Any other
 * header rejects the whole sheet, as do duplicate or missing qualified columns.
 * Output order is always `qualifiedColumns` order, whatever the header order.
 */
export function resolveColumns(header: readonly string[], ruleSet: RuleSet): ResolvedColumns {
  const { disease } = ruleSet;
  const qualified = new Set(ruleSet.qualifiedColumns);
  const byIndex: Array<string | undefined> = [];
  const indexOf = new Map<string, number>();
  const ignored: string[] = [];

  header.forEach((cell, i) => {
    const name = String(cell ?? "").trim();
    if (!name) {
      log.debug(`Skipping column ${i + 1} in '${disease}' since its header is empty`);
      byIndex.push(undefined);
      return;
    }
    let canonical: string | undefined;
    const renamed = ruleSet.renameMap.get(name);
    if (renamed !== undefined) {
      canonical = renamed;
    } else if (ruleSet.ignoredColumns.has(name)) {
      log.info(`Ignoring column '${name}' in worksheet '${disease}'`);
      ignored.push(name);
      byIndex.push(undefined);
      return;
    } else if (qualified.has(name)) {
      canonical = name;
    } else {
      throw new SchemaError(`Encountered unqualified column name '${name}' for worksheet '${disease}'`, {
        disease,
        column: name,
        kind: "unqualified",
      });
    }
    if (indexOf.has(canonical)) {
      throw new SchemaError(`Column '${canonical}' appears more than once in worksheet '${disease}'`, {
        disease,
        column: canonical,
        kind: "duplicate",
      });
    }
    indexOf.set(canonical, i);
    byIndex.push(canonical);
    log.debug(`Found column '${name}' at position ${i + 1}${canonical !== name ? ` as '${canonical}'` : ""}`);
  });

  for (const col of ruleSet.qualifiedColumns) {
    if (!indexOf.has(col)) {
      throw new SchemaError(`Qualified column '${col}' is missing from worksheet '${disease}'`, {
        disease,
        column: col,
        kind: "missing",
      });
    }
  }

  return { byIndex, indexOf, ignored };
}

/** Header used for sheets without one: qualified columns, positionally. */
export function positionalHeader(ruleSet: RuleSet): string[] {
  return [...ruleSet.qualifiedColumns];
}
