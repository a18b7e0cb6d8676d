/*
Incident RAG - Types
GPL-2.0-only
*/

export type SourceKind = "file" | "url";

/** Canonical incident shape produced by ingestion. */
export interface IncidentRecord {
  id: string;
  title: string;
  description: string;
  project: string;
  source: string; // filename or URL
  extra: Record<string, string>; // remaining source fields, values capped in length
}

export type IncidentMetadata = Record<string, string>;

export interface StoredEntry {
  id: string;
  document: string; // text that was embedded
  embedding: number[];
  metadata: IncidentMetadata;
}

export type IngestResult =
  | { success: true; incidents_loaded: number; source: string; source_type: SourceKind }
  | { success?: false; error: string; traceback?: string };

export interface DisplayMetadata {
  ID: string;
  Proyecto: string;
  Fecha: string;
  Descripción: string;
  Solución: string;
  Estado: string;
  Prioridad: string;
  [key: string]: string;
}

export interface SimilarIncident {
  id: string;
  similarity_score: number;
  text: string; // preview
  full_text: string;
  metadata: DisplayMetadata;
}

export type SearchResult =
  | { query: string; similar_incidents: SimilarIncident[]; total_found: number; search_time_ms: number }
  | { query: string; error: string; traceback?: string; similar_incidents: [] };

export interface LayoutIncident {
  id: string;
  text: string;
  metadata: Record<string, string>;
}

export interface Sun {
  name: string;
  x: number;
  y: number;
  z: number;
  size: number;
  incident_count: number;
  incidents: LayoutIncident[];
  has_more: boolean;
}

export interface LayoutData {
  success: true;
  suns: Sun[];
  total_projects: number;
  total_incidents: number;
  generated_at?: string;
}

export type LayoutResult = LayoutData | { success: false; error: string; traceback?: string };

export type StatsResult =
  | {
      total_incidents: number;
      collection_name: string;
      has_data: boolean;
      embedding_provider: string;
      embedding_dimension: number;
      cache: { present: boolean; total_incidents?: number; generated_at?: string };
      rag_ready: boolean;
    }
  | { error: string; total_incidents: 0; has_data: false; rag_ready: false };

export type ClearResult = { success: true; message: string } | { success?: false; error: string };
