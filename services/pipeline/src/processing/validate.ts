import { SchemaError } from '../errors';
import { REQUIRED_COLUMNS, type CleanTable } from '../records';

const MAX_LISTED_KEYS = 10;

function listKeys(keys: readonly string[]): string {
  const shown = keys.slice(0, MAX_LISTED_KEYS).join(', ');
  return keys.length > MAX_LISTED_KEYS ? `${shown}, … (${keys.length} total)` : shown;
}

/**
 * Collects every contract violation in the clean table and throws them
 * together. Returns the table untouched when it is valid.
 */
export function validateCleanTable(table: CleanTable): CleanTable {
  const violations: string[] = [];

  const present = new Set(table.columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    violations.push(`missing required columns: ${missing.join(', ')}`);
  }

  let nullKeys = 0;
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  const negative: string[] = [];

  table.rows.forEach((row, index) => {
    if (row.unique_key === null) {
      nullKeys += 1;
    } else if (seen.has(row.unique_key)) {
      duplicates.add(row.unique_key);
    } else {
      seen.add(row.unique_key);
    }
    if (row.response_hours !== null && row.response_hours < 0) {
      negative.push(row.unique_key ?? `row ${index}`);
    }
  });

  if (nullKeys > 0) {
    violations.push(`unique_key is null in ${nullKeys} row(s)`);
  }
  if (duplicates.size > 0) {
    violations.push(`duplicate unique_key values: ${listKeys([...duplicates])}`);
  }
  if (negative.length > 0) {
    violations.push(`negative response_hours for: ${listKeys(negative)}`);
  }

  if (violations.length > 0) {
    throw new SchemaError(violations);
  }
  return table;
}
