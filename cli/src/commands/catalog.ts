import chalk from "chalk";
import { refreshStore, searchProducts, searchVersions } from "../lib/api.js";
import type { ApiTarget } from "../lib/config.js";
import { fmt } from "../lib/format.js";

export async function productsCommand(target: ApiTarget, store: string, query = ""): Promise<void> {
  const products = await searchProducts(target, store, query);
  if (products.length === 0) {
    console.log(fmt.warn(query ? `No products match "${query}"` : "No products"));
    return;
  }
  for (const product of products) {
    console.log(`${product.name} ${chalk.dim(product.id)}`);
  }
}

export async function versionsCommand(
  target: ApiTarget,
  store: string,
  productId: string,
  query = ""
): Promise<void> {
  const versions = await searchVersions(target, store, productId, query);
  if (versions.length === 0) {
    console.log(fmt.warn(`No versions found for product ${productId}`));
    return;
  }
  for (const version of versions) {
    console.log(`${version.name} ${chalk.dim(version.id)}`);
  }
}

export async function refreshCommand(target: ApiTarget, store: string): Promise<void> {
  const result = await refreshStore(target, store);
  console.log(
    fmt.success(`Refreshed ${result.store_id}: ${result.product_count} products, ${result.version_count} versions`)
  );
}
