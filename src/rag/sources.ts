/*
Incident RAG - Source loaders (CSV, JSON, scraped pages)
GPL-2.0-only
*/

import fs from "node:fs/promises";
import path from "node:path";
import type { AxiosInstance } from "axios";
import { JSDOM } from "jsdom";
import { formatErrorMessage, loggerFor } from "../logger.js";
import { SourceNotFoundError, UnsupportedFormatError } from "./errors.js";
import { normalizeIncident, webIncident } from "./normalizer.js";
import type { IncidentRecord } from "./types.js";

export const PARSE_CHUNK_SIZE = 100;
export const MIN_WEB_TEXT_LENGTH = 20;

/** Keys tried, in order, when a JSON document wraps its incident list in an object. */
export const JSON_CONTAINER_KEYS = ["incidencias", "data", "items", "incidents", "records"] as const;

export const INCIDENT_CLASS_KEYWORDS = ["incident", "incidencia", "issue", "ticket"] as const;

const log = loggerFor("ingest");

/**
 * Locate a file source: `<dataDir>/../data/<name>`, then `<dataDir>/<name>`,
 * then the name as given (relative to the working directory).
 */
export async function resolveSourceFile(name: string, dataDir: string): Promise<string> {
  const candidates = [path.join(dataDir, "..", "data", name), path.join(dataDir, name), path.resolve(name)];
  for (const candidate of candidates) {
    const stat = await fs.stat(candidate).catch(() => null);
    if (stat?.isFile()) {
      return candidate;
    }
  }
  throw new SourceNotFoundError(`File not found: ${name}`, { details: { searched: candidates } });
}

export async function loadFileIncidents(name: string, dataDir: string): Promise<IncidentRecord[]> {
  const ext = path.extname(name).toLowerCase();
  if (ext !== ".json" && ext !== ".csv") {
    throw new UnsupportedFormatError(`Unsupported file type: ${ext || "(none)"}`, { details: { file: name } });
  }
  const filePath = await resolveSourceFile(name, dataDir);
  const text = await fs.readFile(filePath, "utf8");
  log.info(`loading ${ext.slice(1)} file=${filePath} bytes=${Buffer.byteLength(text)}`);
  return ext === ".json" ? parseJsonIncidents(text, name) : parseCsvIncidents(text, name);
}

// --- JSON ---

export function parseJsonIncidents(text: string, source: string): IncidentRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(stripBom(text));
  } catch (error) {
    throw new UnsupportedFormatError(`Invalid JSON: ${formatErrorMessage(error)}`, { cause: error });
  }

  const items = findIncidentList(data);
  const incidents: IncidentRecord[] = [];
  for (let chunkStart = 0; chunkStart < items.length; chunkStart += PARSE_CHUNK_SIZE) {
    const chunk = items.slice(chunkStart, chunkStart + PARSE_CHUNK_SIZE);
    chunk.forEach((item, offset) => {
      if (isRecord(item)) {
        incidents.push(normalizeIncident(item, chunkStart + offset, "json", source));
      }
    });
    if (chunkStart > 0 && chunkStart % 500 === 0) {
      log.info(`parsed items=${chunkStart} of ${items.length}`);
    }
  }
  return incidents;
}

/** The array of incidents inside a parsed JSON document, or `[]` if there is none. */
export function findIncidentList(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return [];
  for (const key of JSON_CONTAINER_KEYS) {
    const value = data[key];
    if (Array.isArray(value)) return value;
  }
  for (const value of Object.values(data)) {
    if (Array.isArray(value)) return value;
  }
  return [];
}

// --- CSV ---

export function parseCsvIncidents(text: string, source: string): IncidentRecord[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const columns = header.map((column) => column.trim());
  return rows.map((cells, index) => {
    const row: Record<string, string> = {};
    columns.forEach((column, columnIndex) => {
      if (column) row[column] = cells[columnIndex] ?? "";
    });
    return normalizeIncident(row, index, "csv", source);
  });
}

/** RFC 4180 style: comma separated, `"` quoting with `""` escapes, quoted fields may span lines. */
export function parseCsv(text: string): string[][] {
  const input = stripBom(text);
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(current);
    current = "";
    if (row.length > 1 || row[0].trim() !== "") {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (inQuotes) {
      if (ch === '"' && input[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(current);
      current = "";
    } else if (ch === "\n") {
      endRow();
    } else if (ch !== "\r") {
      current += ch;
    }
  }
  if (current !== "" || row.length > 0) {
    endRow();
  }
  return rows;
}

// --- Web pages ---

export async function scrapeIncidents(url: string, http: AxiosInstance, timeoutMs: number): Promise<IncidentRecord[]> {
  let html: string;
  try {
    const response = await http.get<string>(url, { timeout: timeoutMs, responseType: "text" });
    html = String(response.data);
  } catch (error) {
    throw new SourceNotFoundError(`Could not fetch ${url}: ${formatErrorMessage(error)}`, { cause: error });
  }
  return extractIncidentsFromHtml(html, url);
}

/**
 * Block elements (`div`, `li`, `tr`) whose class mentions an incident keyword
 * become one incident each, when their text is longer than {@link MIN_WEB_TEXT_LENGTH}.
 */
export function extractIncidentsFromHtml(html: string, url: string): IncidentRecord[] {
  const { document, NodeFilter } = new JSDOM(html).window;
  const incidents: IncidentRecord[] = [];
  let index = 0;
  for (const element of Array.from(document.querySelectorAll("div[class], li[class], tr[class]"))) {
    const className = (element.getAttribute("class") ?? "").toLowerCase();
    if (!INCIDENT_CLASS_KEYWORDS.some((keyword) => className.includes(keyword))) continue;
    const fragments: string[] = [];
    const walker = document.createTreeWalker(element, NodeFilter.SHOW_TEXT);
    for (let node = walker.nextNode(); node; node = walker.nextNode()) {
      const fragment = (node.nodeValue ?? "").trim();
      if (fragment) fragments.push(fragment);
    }
    const text = fragments.join(" ").replace(/\s+/g, " ");
    if (text.length > MIN_WEB_TEXT_LENGTH) {
      incidents.push(webIncident(text, index, url));
    }
    index += 1;
  }
  return incidents;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
