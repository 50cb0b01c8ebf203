import { getStoreStatus, removeStore, setStoreKey } from "../lib/api.js";
import type { ApiTarget } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export async function storeStatusCommand(target: ApiTarget, store: string, options: { json?: boolean } = {}): Promise<void> {
  const status = await getStoreStatus(target, store);

  if (options.json) {
    console.log(fmt.json(status));
    return;
  }

  console.log(fmt.header(`Store ${status.store_id}`));
  console.log(fmt.label("State:", fmt.state(status.state)));
  console.log(fmt.label("Owner:", status.username ?? "unknown"));
  console.log(fmt.label("Last refreshed:", status.last_refreshed ?? "never"));
  console.log(fmt.label("Products:", String(status.product_count)));
  console.log(fmt.label("Versions:", String(status.version_count)));

  if (status.invalid) {
    console.log(
      "\n" + fmt.warn("The store rejected its API key. Register a new one with `keyward store set-key`.")
    );
  }
}

export async function storeSetKeyCommand(target: ApiTarget, store: string, apiKey: string): Promise<void> {
  const result = await setStoreKey(target, store, apiKey);
  console.log(fmt.success(`API key registered for ${result.store_id} (${result.display_name})`));
}

export async function storeRemoveCommand(target: ApiTarget, store: string): Promise<void> {
  const result = await removeStore(target, store);
  console.log(
    fmt.success(`Removed ${result.store_id} and ${result.audit_records_removed} activation records`)
  );
}
