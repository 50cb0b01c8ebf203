import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export const CONFIG_DIR = path.join(os.homedir(), ".keyward");
export const CONFIG_FILE = path.join(CONFIG_DIR, "config.json");
export const DEFAULT_URL = "http://localhost:8787";

export interface Config {
  url: string;
  adminToken?: string;
  configuredAt?: string;
}

/** Where commands send requests, after env overrides. */
export interface ApiTarget {
  url: string;
  adminToken?: string;
}

function isConfig(value: unknown): value is Config {
  if (typeof value !== "object" || value === null || !("url" in value)) return false;
  return typeof value.url === "string" && (!("adminToken" in value) || typeof value.adminToken === "string");
}

export function configExists(): boolean {
  return fs.existsSync(CONFIG_FILE);
}

export function loadConfig(): Config | null {
  if (!configExists()) {
    return null;
  }

  try {
    const content = fs.readFileSync(CONFIG_FILE, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return isConfig(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function saveConfig(config: Config): void {
  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }

  // Holds the admin token.
  fs.writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2), { mode: 0o600 });
}

/**
 * Merge the saved config with KEYWARD_URL / KEYWARD_ADMIN_TOKEN, which win.
 */
export function resolveTarget(env: Record<string, string | undefined> = process.env): ApiTarget {
  const saved = loadConfig();
  const url = env.KEYWARD_URL || saved?.url || DEFAULT_URL;
  const adminToken = env.KEYWARD_ADMIN_TOKEN || saved?.adminToken;
  return { url: url.replace(/\/+$/, ""), adminToken };
}
