/*
Incident RAG - Project layout ("galaxy") cache
GPL-2.0-only
*/

import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { formatISO } from "date-fns";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import { LAYOUT_PROJECT_FIELD, resolveField } from "./aliases.js";
import { describeError, NoDataError } from "./errors.js";
import type { LayoutData, LayoutIncident, LayoutResult, Sun } from "./types.js";
import type { CollectionDump, CollectionSource } from "./vectorStore.js";

export const LAYOUT_CACHE_FILE = "galaxy_cache.json";
export const MAX_INCIDENTS_PER_SUN = 500;
export const LAYOUT_TEXT_LENGTH = 150;
export const LAYOUT_METADATA_VALUE_LENGTH = 50;

export interface SunPosition {
  x: number;
  y: number;
  z: number;
}

export interface CacheInfo {
  present: boolean;
  total_incidents?: number;
  generated_at?: string;
}

export class LayoutCache {
  readonly cacheFile: string;
  private readonly log: PrefixedLogger;

  constructor(
    private readonly collection: CollectionSource,
    dataDir: string,
    logger?: PrefixedLogger,
  ) {
    this.cacheFile = path.join(dataDir, LAYOUT_CACHE_FILE);
    this.log = logger ?? loggerFor("layout");
  }

  async layout(useCache: boolean = true): Promise<LayoutResult> {
    try {
      const collection = await this.collection.current();
      if (useCache) {
        const cached = await this.readCache();
        const live = await collection.count();
        if (cached && cached.total_incidents === live) {
          this.log.debug(`cache hit incidents=${live}`);
          return cached;
        }
        this.log.info(
          cached
            ? `cache stale cached=${cached.total_incidents} live=${live}, regenerating`
            : "cache missing, regenerating",
        );
      }

      const layout = buildLayout(await collection.getAll(), formatISO(new Date()));
      await this.writeCache(layout);
      return layout;
    } catch (error) {
      this.log.error(`layout failed error=${formatErrorMessage(error)}`);
      return { success: false, ...describeError(error) };
    }
  }

  /** The persisted layout, or null when the file is absent or unreadable. */
  async readCache(): Promise<LayoutData | null> {
    let text: string;
    try {
      text = await fs.readFile(this.cacheFile, "utf8");
    } catch {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return isLayoutData(parsed) ? parsed : null;
    } catch (error) {
      this.log.warn(`ignoring unreadable cache file=${this.cacheFile} error=${formatErrorMessage(error)}`);
      return null;
    }
  }

  async cacheInfo(): Promise<CacheInfo> {
    const cached = await this.readCache();
    if (!cached) return { present: false };
    return {
      present: true,
      total_incidents: cached.total_incidents,
      ...(cached.generated_at ? { generated_at: cached.generated_at } : {}),
    };
  }

  async invalidate(): Promise<void> {
    await fs.rm(this.cacheFile, { force: true });
  }

  private async writeCache(layout: LayoutData): Promise<void> {
    const tmp = `${this.cacheFile}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(layout, null, 2), "utf8");
      await fs.rename(tmp, this.cacheFile);
      this.log.info(`cache written file=${this.cacheFile} incidents=${layout.total_incidents}`);
    } catch (error) {
      this.log.warn(`cache write failed file=${this.cacheFile} error=${formatErrorMessage(error)}`);
      await fs.rm(tmp, { force: true }).catch(() => undefined);
    }
  }
}

/** Group a collection dump into one sun per project, in first-seen order. */
export function buildLayout(dump: CollectionDump, generatedAt?: string): LayoutData {
  if (dump.ids.length === 0) {
    throw new NoDataError("No incidents stored");
  }

  const groups = new Map<string, LayoutIncident[]>();
  dump.ids.forEach((id, index) => {
    const metadata = dump.metadatas[index] ?? {};
    const project = resolveField(metadata, LAYOUT_PROJECT_FIELD);
    const incident: LayoutIncident = {
      id,
      text: (dump.documents[index] ?? "").slice(0, LAYOUT_TEXT_LENGTH),
      metadata: Object.fromEntries(
        Object.entries(metadata).map(([key, value]) => [key, value.slice(0, LAYOUT_METADATA_VALUE_LENGTH)]),
      ),
    };
    const members = groups.get(project);
    if (members) {
      members.push(incident);
    } else {
      groups.set(project, [incident]);
    }
  });

  const suns: Sun[] = [...groups].map(([name, incidents]) => ({
    name,
    ...sunPosition(name),
    size: incidents.length,
    incident_count: incidents.length,
    incidents: incidents.slice(0, MAX_INCIDENTS_PER_SUN),
    has_more: incidents.length > MAX_INCIDENTS_PER_SUN,
  }));

  return {
    success: true,
    suns,
    total_projects: suns.length,
    total_incidents: dump.ids.length,
    ...(generatedAt ? { generated_at: generatedAt } : {}),
  };
}

/** Deterministic position derived from the MD5 digest of the project name. */
export function sunPosition(name: string): SunPosition {
  const h = BigInt(`0x${crypto.createHash("md5").update(name, "utf8").digest("hex")}`);
  const angle = (Number(h % 360n) * Math.PI) / 180;
  const radius = 30 + Number(h % 50n);
  return {
    x: Math.cos(angle) * radius,
    y: Number(h % 20n) - 10,
    z: Math.sin(angle) * radius,
  };
}

function isLayoutData(value: unknown): value is LayoutData {
  if (typeof value !== "object" || value === null) return false;
  if (!("success" in value) || value.success !== true) return false;
  if (!("total_incidents" in value) || typeof value.total_incidents !== "number") return false;
  if (!("total_projects" in value) || typeof value.total_projects !== "number") return false;
  return "suns" in value && Array.isArray(value.suns) && value.suns.every(isSun);
}

function isSun(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "incidents" in value &&
    Array.isArray(value.incidents) &&
    "incident_count" in value &&
    typeof value.incident_count === "number"
  );
}
