import path from "node:path";
import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export type PluginEnv = {
  inboxRoot: string;
  archiveRoot: string;
  extractFootprint: boolean;
  debug: boolean;
};

type EnvSource = Record<string, string | undefined>;

function readFlag(source: EnvSource, key: string, fallback: boolean): boolean {
  const raw = (source[key] ?? "").trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true") return true;
  if (raw === "0" || raw === "false") return false;
  throw new Error(`Invalid ${key}='${source[key]}'. Use 1/0 or true/false.`);
}

function readPath(source: EnvSource, key: string, fallback: string): string {
  const raw = (source[key] ?? "").trim();
  return path.resolve(raw || fallback);
}

export function readPluginEnv(source: EnvSource = process.env): PluginEnv {
  return {
    inboxRoot: readPath(source, "S5P_INBOX_ROOT", "inbox"),
    archiveRoot: readPath(source, "S5P_ARCHIVE_ROOT", "archive"),
    extractFootprint: readFlag(source, "S5P_EXTRACT_FOOTPRINT", true),
    debug: readFlag(source, "S5P_DEBUG", false),
  };
}
