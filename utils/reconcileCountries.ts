import type { CountryRecord, CountryUpdate, StoredCountry } from "../types/country";

export interface Reconciliation {
  toInsert: CountryRecord[];
  toUpdate: CountryUpdate[];
}

/** Case-folded name; also stored as `countries.name_key`. */
export function nameKey(name: string): string {
  return name.toLowerCase();
}

/**
 * Split incoming records into inserts and updates by case-insensitive name.
 *
 * Existing rows are indexed once, so each incoming record costs one map
 * lookup. An update carries the incoming values on the stored row's id and
 * name. Incoming records that collide with each other under case folding
 * collapse into a single entry: the later record replaces the earlier one
 * in place.
 */
export function reconcileCountries(
  existing: readonly StoredCountry[],
  incoming: readonly CountryRecord[]
): Reconciliation {
  const stored = new Map<string, StoredCountry>();
  for (const country of existing) {
    stored.set(nameKey(country.name), country);
  }

  const result: Reconciliation = { toInsert: [], toUpdate: [] };
  // folded name -> position in its bucket, for in-batch collisions
  const placed = new Map<string, number>();

  for (const record of incoming) {
    const key = nameKey(record.name);
    const match = stored.get(key);
    const position = placed.get(key);

    if (match !== undefined) {
      const update: CountryUpdate = { ...record, id: match.id, name: match.name };
      if (position !== undefined) {
        result.toUpdate[position] = update;
      } else {
        placed.set(key, result.toUpdate.length);
        result.toUpdate.push(update);
      }
    } else if (position !== undefined) {
      result.toInsert[position] = record;
    } else {
      placed.set(key, result.toInsert.length);
      result.toInsert.push(record);
    }
  }

  return result;
}
