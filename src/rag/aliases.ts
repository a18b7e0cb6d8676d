/*
Incident RAG - Field alias tables
GPL-2.0-only
*/

/**
 * Sources spell the same attribute many ways (`description`, `descripcion`,
 * `Descripción`, ...). Each canonical field lists the keys it accepts, in
 * priority order; the first key present with a non-null value wins.
 */
export interface FieldAlias {
  readonly aliases: readonly string[];
  readonly fallback: string;
}

export const INGEST_FIELDS = {
  id: { aliases: ["id", "ID", "_id"], fallback: "" },
  title: { aliases: ["title", "titulo", "Proyecto", "nombre"], fallback: "Sin título" },
  description: { aliases: ["description", "descripcion", "Descripción", "desc"], fallback: "" },
  project: { aliases: ["Proyecto", "proyecto", "project"], fallback: "Sin proyecto" },
} as const satisfies Record<string, FieldAlias>;

/** Metadata key the project is stored under; the first alias search and layout look at. */
export const PROJECT_METADATA_KEY = "Proyecto";

/** Display fields rebuilt for search hits. `ID` and `Descripción` fall back to hit-specific values. */
export const DISPLAY_FIELDS = {
  ID: { aliases: ["ID", "id", "Identificador_incidencia"], fallback: "" },
  Proyecto: { aliases: ["Proyecto", "proyecto", "project"], fallback: "No especificado" },
  Fecha: { aliases: ["Fecha", "fecha", "Fecha_envío_incidencia", "Fecha del incidente"], fallback: "N/A" },
  Descripción: {
    aliases: ["Descripción", "descripcion", "Descripcion Problema", "Descripción_incidencia", "description"],
    fallback: "",
  },
  Solución: { aliases: ["Solución", "solucion", "Solucion"], fallback: "No registrada" },
  Estado: { aliases: ["Estado", "estado", "status"], fallback: "" },
  Prioridad: { aliases: ["Prioridad", "prioridad", "priority"], fallback: "" },
} as const satisfies Record<string, FieldAlias>;

export const LAYOUT_PROJECT_FIELD: FieldAlias = { aliases: ["Proyecto", "proyecto"], fallback: "Sin proyecto" };

/** Keys consumed by display fields; they are not repeated in the pass-through part. */
export const DISPLAY_CLAIMED_KEYS: ReadonlySet<string> = new Set([
  ...Object.values(DISPLAY_FIELDS).flatMap((field) => field.aliases),
  "source",
]);

export function findAlias(record: Readonly<Record<string, unknown>>, aliases: readonly string[]): unknown {
  for (const key of aliases) {
    if (Object.prototype.hasOwnProperty.call(record, key)) {
      const value = record[key];
      if (value !== null && value !== undefined) {
        return value;
      }
    }
  }
  return undefined;
}

export function resolveField(
  record: Readonly<Record<string, unknown>>,
  field: FieldAlias,
  fallback: string = field.fallback,
): string {
  const value = findAlias(record, field.aliases);
  return value === undefined ? fallback : stringifyValue(value);
}

export function stringifyValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}
