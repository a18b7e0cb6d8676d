/*
Incident RAG - Record normalisation
GPL-2.0-only
*/

import { INGEST_FIELDS, PROJECT_METADATA_KEY, resolveField, stringifyValue } from "./aliases.js";
import type { IncidentMetadata, IncidentRecord } from "./types.js";

export const MAX_EXTRA_VALUE_LENGTH = 500;
export const WEB_TITLE_LENGTH = 100;
export const WEB_PROJECT = "Web Scraping";

export type RecordOrigin = "json" | "csv" | "web";

// Output keys of a normalised record; source fields with these names are not copied into `extra`.
const CANONICAL_KEYS: ReadonlySet<string> = new Set(["id", "title", "description", "source", PROJECT_METADATA_KEY]);

/**
 * Map one heterogeneous source row onto the canonical incident shape.
 * `index` is the row's position in its source and seeds the synthetic id.
 */
export function normalizeIncident(
  item: Readonly<Record<string, unknown>>,
  index: number,
  origin: RecordOrigin,
  source: string,
): IncidentRecord {
  const id = resolveField(item, INGEST_FIELDS.id);
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(item)) {
    if (CANONICAL_KEYS.has(key) || value === null || value === undefined) continue;
    extra[key] = stringifyValue(value).slice(0, MAX_EXTRA_VALUE_LENGTH);
  }

  return {
    id: id || `${origin}_${index}`,
    title: resolveField(item, INGEST_FIELDS.title),
    description: resolveField(item, INGEST_FIELDS.description),
    project: resolveField(item, INGEST_FIELDS.project),
    source,
    extra,
  };
}

export function webIncident(text: string, index: number, url: string): IncidentRecord {
  return {
    id: `web_${index}`,
    title: text.slice(0, WEB_TITLE_LENGTH),
    description: text,
    project: WEB_PROJECT,
    source: url,
    extra: {},
  };
}

/** Text that gets embedded for a record. */
export function documentText(record: IncidentRecord): string {
  return `${record.title} ${record.description} ${record.project}`;
}

/** Flattened metadata stored beside the vector: the record minus its id. */
export function recordMetadata(record: IncidentRecord): IncidentMetadata {
  return {
    ...record.extra,
    title: record.title,
    description: record.description,
    source: record.source,
    [PROJECT_METADATA_KEY]: record.project,
  };
}
