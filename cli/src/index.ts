#!/usr/bin/env node

import { program } from "commander";
import { resolveTarget } from "./lib/config.js";
import { describeError } from "./lib/format.js";
import { configSetCommand, configShowCommand } from "./commands/config.js";
import { activateCommand } from "./commands/activate.js";
import { productsCommand, refreshCommand, versionsCommand } from "./commands/catalog.js";
import { storeRemoveCommand, storeSetKeyCommand, storeStatusCommand } from "./commands/store.js";
import {
  licenseDeactivateCommand,
  licenseInfoCommand,
  licenseLockCommand,
  licenseUnlockCommand,
} from "./commands/license.js";

async function run(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (error) {
    for (const line of describeError(error)) console.error(line);
    process.exit(1);
  }
}

program
  .name("keyward")
  .description("Operator CLI for the keyward license activation gateway")
  .version("1.0.0");

const configCmd = program.command("config").description("Manage CLI configuration");

configCmd
  .command("set")
  .description("Save the server URL and admin token")
  .option("--url <url>", "Server base URL")
  .option("--token <token>", "Admin token")
  .action((options: { url?: string; token?: string }) => run(() => configSetCommand(options)));

configCmd
  .command("show")
  .description("Show the effective configuration")
  .action(() => run(() => configShowCommand()));

program
  .command("activate <store> <key> <identity>")
  .description("Activate a license key for an identity")
  .option("--json", "Print the raw response")
  .action((store: string, key: string, identity: string, options: { json?: boolean }) =>
    run(() => activateCommand(resolveTarget(), store, key, identity, options))
  );

program
  .command("products <store> [query]")
  .description("Search a store's products by name")
  .action((store: string, query: string | undefined) => run(() => productsCommand(resolveTarget(), store, query)));

program
  .command("versions <store> <productId> [query]")
  .description("Search a product's versions by name")
  .action((store: string, productId: string, query: string | undefined) =>
    run(() => versionsCommand(resolveTarget(), store, productId, query))
  );

program
  .command("refresh <store>")
  .description("Force a refresh of a store's product metadata")
  .action((store: string) => run(() => refreshCommand(resolveTarget(), store)));

const storeCmd = program.command("store").description("Manage store credentials and cache");

storeCmd
  .command("status <store>")
  .description("Show cache state and credential health")
  .option("--json", "Print the raw response")
  .action((store: string, options: { json?: boolean }) =>
    run(() => storeStatusCommand(resolveTarget(), store, options))
  );

storeCmd
  .command("set-key <store> <apiKey>")
  .description("Register or rotate the store's API key")
  .action((store: string, apiKey: string) => run(() => storeSetKeyCommand(resolveTarget(), store, apiKey)));

storeCmd
  .command("remove <store>")
  .description("Forget a store, its cache and its activation records")
  .action((store: string) => run(() => storeRemoveCommand(resolveTarget(), store)));

const licenseCmd = program.command("license").description("Manage license activations");

licenseCmd
  .command("info <store> <license>")
  .description("Show a license and the identities using it")
  .option("--json", "Print the raw response")
  .action((store: string, license: string, options: { json?: boolean }) =>
    run(() => licenseInfoCommand(resolveTarget(), store, license, options))
  );

licenseCmd
  .command("lock <store> <license>")
  .description("Block new activations of a license")
  .action((store: string, license: string) => run(() => licenseLockCommand(resolveTarget(), store, license)));

licenseCmd
  .command("unlock <store> <license>")
  .description("Allow activations of a license again")
  .action((store: string, license: string) => run(() => licenseUnlockCommand(resolveTarget(), store, license)));

licenseCmd
  .command("deactivate <store> <license> <identity>")
  .description("Remove an identity's activation from a license")
  .action((store: string, license: string, identity: string) =>
    run(() => licenseDeactivateCommand(resolveTarget(), store, license, identity))
  );

await program.parseAsync();
