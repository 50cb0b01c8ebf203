import { CONFIG_FILE, DEFAULT_URL, loadConfig, resolveTarget, saveConfig, type Config } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export interface ConfigSetOptions {
  url?: string;
  token?: string;
}

export function configSetCommand(options: ConfigSetOptions): void {
  if (options.url === undefined && options.token === undefined) {
    throw new Error("Nothing to set. Pass --url and/or --token.");
  }

  const current = loadConfig();
  const url = options.url ?? current?.url ?? DEFAULT_URL;
  if (!URL.canParse(url)) {
    throw new Error(`Not a valid URL: ${url}`);
  }

  const config: Config = {
    url: url.replace(/\/+$/, ""),
    adminToken: options.token ?? current?.adminToken,
    configuredAt: new Date().toISOString(),
  };
  saveConfig(config);

  console.log(fmt.success(`Saved ${CONFIG_FILE}`));
  console.log(fmt.label("URL:", config.url));
  console.log(fmt.label("Admin token:", config.adminToken ? "set" : "not set"));
}

export function configShowCommand(): void {
  const target = resolveTarget();
  console.log(fmt.label("URL:", target.url));
  console.log(fmt.label("Admin token:", target.adminToken ? "set" : "not set"));
  if (process.env.KEYWARD_URL || process.env.KEYWARD_ADMIN_TOKEN) {
    console.log(fmt.warn("Environment overrides are active (KEYWARD_URL / KEYWARD_ADMIN_TOKEN)"));
  }
}
