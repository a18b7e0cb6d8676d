import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as yamlParse } from "yaml";

export type EmbeddingProviderKind = "remote" | "local" | "hash";

export interface EmbeddingConfig {
  provider: EmbeddingProviderKind;
  /** Base URL of the embedding service (remote provider only). */
  url: string;
  model: string;
  dimension: number;
  timeoutMs: number;
}

export interface IncidentRagConfig {
  /** Directory holding the layout cache; file sources are also looked up beside it. */
  dataDir: string;
  collection: string;
  chroma: {
    url: string;
  };
  embedding: EmbeddingConfig;
  scrape: {
    timeoutMs: number;
  };
}

const REPO_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

const DEFAULT_EMBEDDING: Record<EmbeddingProviderKind, Omit<EmbeddingConfig, "provider" | "url" | "timeoutMs">> = {
  remote: { model: "nomic-embed-text", dimension: 768 },
  local: { model: "Xenova/paraphrase-multilingual-MiniLM-L12-v2", dimension: 384 },
  hash: { model: "sha256-feature-hash", dimension: 384 },
};

const DEFAULT_CONFIG: IncidentRagConfig = {
  dataDir: join(REPO_ROOT, "rag_db"),
  collection: "incidents",
  chroma: { url: "http://localhost:8000" },
  embedding: {
    provider: "remote",
    url: "http://localhost:11434",
    timeoutMs: 30_000,
    ...DEFAULT_EMBEDDING.remote,
  },
  scrape: { timeoutMs: 15_000 },
};

let cachedConfig: IncidentRagConfig | null = null;

export function loadConfig(): IncidentRagConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = readRawConfig();
  const embeddingRaw = asRecord(raw.embedding);
  const chromaRaw = asRecord(raw.chroma);
  const scrapeRaw = asRecord(raw.scrape);

  const provider =
    providerKind(process.env.EMBEDDING_PROVIDER) ??
    providerKind(embeddingRaw.provider) ??
    DEFAULT_CONFIG.embedding.provider;
  const providerDefaults = DEFAULT_EMBEDDING[provider];

  const dataDirSetting = firstDefined(configuredString(process.env.INCIDENT_RAG_DATA_DIR), configuredString(raw.dataDir));

  const config: IncidentRagConfig = {
    dataDir: dataDirSetting ? resolve(dataDirSetting) : DEFAULT_CONFIG.dataDir,
    collection: configuredString(raw.collection) ?? DEFAULT_CONFIG.collection,
    chroma: {
      url: stripTrailingSlash(
        firstDefined(configuredString(process.env.CHROMA_URL), configuredString(chromaRaw.url)) ??
          DEFAULT_CONFIG.chroma.url,
      ),
    },
    embedding: {
      provider,
      url: stripTrailingSlash(
        firstDefined(configuredString(process.env.EMBEDDING_URL), configuredString(embeddingRaw.url)) ??
          DEFAULT_CONFIG.embedding.url,
      ),
      model:
        firstDefined(configuredString(process.env.EMBEDDING_MODEL), configuredString(embeddingRaw.model)) ??
        providerDefaults.model,
      dimension: configuredPositiveInt(embeddingRaw.dimension) ?? providerDefaults.dimension,
      timeoutMs: configuredPositiveInt(embeddingRaw.timeoutMs) ?? DEFAULT_CONFIG.embedding.timeoutMs,
    },
    scrape: {
      timeoutMs: configuredPositiveInt(scrapeRaw.timeoutMs) ?? DEFAULT_CONFIG.scrape.timeoutMs,
    },
  };

  cachedConfig = config;
  return config;
}

function readRawConfig(): Record<string, unknown> {
  const candidates = [
    process.env.INCIDENT_RAG_CONFIG,
    join(homedir(), ".incident-rag.json"),
    join(REPO_ROOT, ".incident-rag.json"),
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    let text: string;
    try {
      text = readFileSync(candidate, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) continue;
      throw error;
    }
    // YAML is a superset of JSON, so either syntax is accepted.
    return asRecord(yamlParse(text));
  }
  return {};
}

function isMissingFile(error: unknown): boolean {
  return Boolean(error && typeof error === "object" && "code" in error && error.code === "ENOENT");
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function providerKind(value: unknown): EmbeddingProviderKind | undefined {
  const input = configuredString(value)?.toLowerCase();
  if (input === "remote" || input === "local" || input === "hash") {
    return input;
  }
  if (input === "ollama") {
    return "remote";
  }
  return undefined;
}

function configuredString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function configuredPositiveInt(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    if (Number.isInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }
  return undefined;
}

function stripTrailingSlash(input: string): string {
  return input.replace(/\/+$/, "");
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

export function __resetConfigCacheForTests(): void {
  cachedConfig = null;
}
