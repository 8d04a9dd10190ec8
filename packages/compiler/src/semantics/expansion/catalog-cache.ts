import { type ConstructibleTypeRef, typeKey } from "../type-ref.js";
import { type SiteContext, siteContextKey } from "../visibility.js";
import type { ConstructorCandidate } from "./catalog.js";

export type CatalogCacheKey = {
  ownerType: ConstructibleTypeRef;
  declarationSite: SiteContext;
  /** Constructor-set version of `ownerType` at lookup time. */
  version: number;
};

type CacheEntry = {
  version: number;
  catalog: readonly ConstructorCandidate[];
};

const ownerPrefix = (ownerType: ConstructibleTypeRef): string =>
  `${typeKey(ownerType)}@`;

const slotKey = ({ ownerType, declarationSite }: CatalogCacheKey) =>
  `${ownerPrefix(ownerType)}${siteContextKey(declarationSite)}`;

/**
 * Frozen catalogs, one slot per owner type and declaration site. A slot holds
 * the catalog for a single constructor-set version; publishing a newer
 * version replaces the older one, and an older version never overwrites a
 * newer one.
 */
export class ConstructorCatalogCache {
  #entries = new Map<string, CacheEntry>();
  #builds = 0;

  getOrBuild(
    key: CatalogCacheKey,
    build: () => readonly ConstructorCandidate[]
  ): readonly ConstructorCandidate[] {
    const slot = slotKey(key);
    const existing = this.#entries.get(slot);
    if (existing && existing.version === key.version) {
      return existing.catalog;
    }

    const result = build();
    const built = Object.isFrozen(result) ? result : Object.freeze([...result]);
    this.#builds += 1;
    // build() may re-enter and publish the same key; first entry wins.
    const published = this.#entries.get(slot);
    if (published && published.version === key.version) {
      return published.catalog;
    }
    if (!published || published.version < key.version) {
      this.#entries.set(slot, { version: key.version, catalog: built });
    }
    return built;
  }

  invalidate(ownerType: ConstructibleTypeRef): number {
    const prefix = ownerPrefix(ownerType);
    let removed = 0;
    for (const slot of [...this.#entries.keys()]) {
      if (slot.startsWith(prefix)) {
        this.#entries.delete(slot);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.#entries.size;
  }

  /** Number of catalogs actually built, including any discarded duplicates. */
  get builds(): number {
    return this.#builds;
  }
}
