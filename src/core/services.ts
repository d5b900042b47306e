/**
 * Well-known TCP port → service name table
 */

import { readFileSync } from 'node:fs';

const TABLE_URL = new URL('../../data/services.json', import.meta.url);

let table: ReadonlyMap<number, string> | undefined;

function loadTable(): ReadonlyMap<number, string> {
  const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf-8'));
  const entries = new Map<number, string>();

  if (typeof raw === 'object' && raw !== null) {
    const pairs: Array<[string, unknown]> = Object.entries(raw);
    for (const [port, name] of pairs) {
      if (typeof name === 'string') entries.set(Number(port), name);
    }
  }
  return entries;
}

/**
 * Best-effort protocol name for a port, or undefined if it is not well known
 */
export function lookupService(port: number): string | undefined {
  if (!table) table = loadTable();
  return table.get(port);
}
