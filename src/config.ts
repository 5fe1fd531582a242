import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Version comes straight from package.json (tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call. Prefer the project-root .env next to
// the sources; otherwise fall back to dotenv's default lookup (cwd).
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type TransportMode = "stdio" | "http";

export interface Config {
  /** Snapshot file; persistence is off when unset. */
  STORE_PATH: string | undefined;
  /** Directory ingested at startup; nothing is ingested when unset. */
  INGEST_ROOT: string | undefined;
  /** Extensions (no leading dot) picked up by directory ingestion. */
  ALLOWED_EXT: string[];
  CHUNK_SIZE: number;
  TOP_K: number;
  RERANK: boolean;
  VERBOSE: boolean;
  MODEL_NAME: string | undefined;
  /** Directory holding local model folders; models are never downloaded. */
  MODEL_PATH: string;
  MCP_TRANSPORT: TransportMode;
}

export const DEFAULT_ALLOWED_EXT = ["txt", "md", "pdf"];

/** Tolerant truthy parsing: 1 / true / yes / on. */
export function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Integer env knob clamped into [min, max]; unparsable values fall back. */
export function parseIntInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const n = Number(trimmed);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

/** Read runtime configuration from environment variables. */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const ALLOWED_EXT = env.ALLOWED_EXT?.split(",")
    .map((s) => s.trim().replace(/^\./, "").toLowerCase())
    .filter(Boolean) ?? [...DEFAULT_ALLOWED_EXT];

  // Tokens per window; windows overlap by half. Larger windows favor recall,
  // smaller ones precision.
  const CHUNK_SIZE = parseIntInRange(env.CHUNK_SIZE, 512, 2, 8192);

  const TOP_K = parseIntInRange(env.TOP_K, 5, 1, 50);

  const transport = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const MCP_TRANSPORT: TransportMode =
    transport === "http" || transport === "streamable-http" ? "http" : "stdio";

  return {
    STORE_PATH: env.STORE_PATH?.trim() || undefined,
    INGEST_ROOT: env.INGEST_ROOT?.trim() || undefined,
    ALLOWED_EXT,
    CHUNK_SIZE,
    TOP_K,
    RERANK: parseFlag(env.RERANK),
    VERBOSE: parseFlag(env.VERBOSE),
    MODEL_NAME: env.MODEL_NAME?.trim() || undefined,
    MODEL_PATH: path.resolve(env.MODEL_PATH?.trim() || "models"),
    MCP_TRANSPORT,
  };
}
