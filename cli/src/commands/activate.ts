import { activateLicense } from "../lib/api.js";
import type { ApiTarget } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export async function activateCommand(
  target: ApiTarget,
  store: string,
  licenseKey: string,
  identity: string,
  options: { json?: boolean } = {}
): Promise<void> {
  const result = await activateLicense(target, store, licenseKey, identity);

  if (options.json) {
    console.log(fmt.json(result));
    return;
  }

  console.log(
    fmt.success(
      result.created
        ? `Activated license ${result.license.id} for ${identity}`
        : `License ${result.license.id} is already activated for ${identity}`
    )
  );
  for (const line of fmt.license(result.license)) {
    console.log(`  ${line}`);
  }
}
