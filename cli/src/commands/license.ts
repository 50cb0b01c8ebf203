import { deactivateLicense, getLicenseInfo, lockLicense, unlockLicense } from "../lib/api.js";
import type { ApiTarget } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export async function licenseInfoCommand(
  target: ApiTarget,
  store: string,
  license: string,
  options: { json?: boolean } = {}
): Promise<void> {
  const info = await getLicenseInfo(target, store, license);

  if (options.json) {
    console.log(fmt.json(info));
    return;
  }

  for (const line of fmt.license(info.license)) {
    console.log(line);
  }
  console.log("");
  if (info.identities.length === 0) {
    console.log(fmt.warn("No users have activated this license"));
    return;
  }
  console.log(fmt.label("Users:", String(info.identities.length)));
  for (const identity of info.identities) {
    console.log(`  ${identity}`);
  }
}

export async function licenseLockCommand(target: ApiTarget, store: string, license: string): Promise<void> {
  const result = await lockLicense(target, store, license);
  console.log(
    fmt.success(result.created ? `Locked license ${result.license_id}` : `License ${result.license_id} was already locked`)
  );
}

export async function licenseUnlockCommand(target: ApiTarget, store: string, license: string): Promise<void> {
  const result = await unlockLicense(target, store, license);
  console.log(
    fmt.success(result.removed ? `Unlocked license ${result.license_id}` : `License ${result.license_id} was not locked`)
  );
}

export async function licenseDeactivateCommand(
  target: ApiTarget,
  store: string,
  license: string,
  identity: string
): Promise<void> {
  const result = await deactivateLicense(target, store, license, identity);
  if (result.removed === 0) {
    console.log(fmt.warn(`${identity} has no activation on license ${result.license_id}`));
    return;
  }
  console.log(fmt.success(`Removed ${result.removed} activation(s) for ${identity} from license ${result.license_id}`));
}
