/**
 * Brand registry: maps brand names to adapter factories.
 *
 * Adding a new brand:
 * 1. Create src/social/brands/<name>.ts implementing BrandAdapter
 * 2. Add data/brands/<name>.json with its template pools
 * 3. Register it here
 */

import type { Domain } from "../contracts";
import type { BrandAdapter } from "./types";
import { createAltharaAdapter } from "./brands/althara";
import { createOxonoAdapter } from "./brands/oxono";

type AdapterFactory = () => BrandAdapter;

const REGISTRY: Record<string, AdapterFactory> = {
  althara: createAltharaAdapter,
  oxono: createOxonoAdapter,
};

export function getBrand(name: string): BrandAdapter {
  const factory = REGISTRY[name];
  if (!factory) {
    const available = Object.keys(REGISTRY).join(", ");
    throw new Error(`Unknown brand "${name}". Available: ${available}`);
  }
  return factory();
}

export function getAvailableBrands(): string[] {
  return Object.keys(REGISTRY);
}

/** The brand that publishes a domain's news. */
export function getBrandForDomain(domain: Domain): BrandAdapter {
  for (const name of Object.keys(REGISTRY)) {
    const brand = getBrand(name);
    if (brand.spec.domain === domain) return brand;
  }
  throw new Error(`No brand publishes the "${domain}" domain.`);
}
