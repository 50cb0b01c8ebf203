import chalk from "chalk";
import { KeywardApiError, type LicenseView } from "./api.js";

export type BadgeColor = "green" | "red" | "yellow" | "blue" | "cyan" | "magenta" | "white";

const STATE_COLORS: Record<string, BadgeColor> = {
  fresh: "green",
  stale: "yellow",
  refreshing: "cyan",
  invalid: "red",
};

export const fmt = {
  /**
   * Bold header with "═" double-line border
   */
  header(title: string): string {
    const line = "═".repeat(60);
    return `\n${chalk.bold(line)}\n  ${chalk.bold(title)}\n${chalk.bold(line)}`;
  },

  success(msg: string): string {
    return `${chalk.green("✓")} ${msg}`;
  },

  error(msg: string): string {
    return `${chalk.red("✗")} ${msg}`;
  },

  warn(msg: string): string {
    return `${chalk.yellow("⚠")} ${msg}`;
  },

  /**
   * Dim label with value
   */
  label(key: string, val: string): string {
    return `${chalk.dim(key)} ${val}`;
  },

  /**
   * Syntax-highlighted JSON output, for --json
   */
  json(obj: unknown): string {
    const raw = JSON.stringify(obj, null, 2);
    return raw
      .replace(/"([^"]+)":/g, (_match, key: string) => `${chalk.cyan(`"${key}"`)}:`)
      .replace(/: "([^"]*)"/g, (_match, val: string) => `: ${chalk.green(`"${val}"`)}`)
      .replace(/: (\d+)/g, (_match, num: string) => `: ${chalk.yellow(num)}`)
      .replace(/: (true|false)/g, (_match, bool: string) => `: ${chalk.magenta(bool)}`)
      .replace(/: (null)/g, (_match, n: string) => `: ${chalk.dim(n)}`);
  },

  badge(text: string, color: BadgeColor = "blue"): string {
    return chalk[color](`[${text}]`);
  },

  /** Cache state as a colored badge. */
  state(state: string): string {
    return fmt.badge(state, STATE_COLORS[state] ?? "white");
  },

  license(license: LicenseView): string[] {
    const product = license.version_id
      ? `${license.product_name} ${chalk.dim(`(${license.product_id}, version ${license.version_id})`)}`
      : `${license.product_name} ${chalk.dim(`(${license.product_id})`)}`;
    return [
      fmt.label("License:", license.id),
      fmt.label("Product:", product),
      fmt.label("Activations:", String(license.activation_count)),
      fmt.label("Locked:", license.locked ? chalk.red("yes") : "no"),
    ];
  },
};

/**
 * Lines to print for a failed command. Server errors carry their hint and
 * reference id when the body has them.
 */
export function describeError(error: unknown): string[] {
  if (!(error instanceof KeywardApiError)) {
    return [fmt.error(error instanceof Error ? error.message : String(error))];
  }

  const lines = [fmt.error(`${error.message} (HTTP ${error.status})`)];
  const { hint, ref } = error.details;
  if (typeof hint === "string") lines.push(fmt.label("Hint:", hint));
  if (typeof ref === "string") lines.push(fmt.label("Reference:", ref));
  if (error.code === "unauthorized") {
    lines.push(fmt.label("Hint:", "Check the admin token with `keyward config show`."));
  }
  return lines;
}
