/**
 * Dugout Catalog Package
 *
 * Cached set of known teams and players, the policy deciding when it is
 * refreshed, and free-text resolution against it.
 */

export {
    CutoffFreshnessPolicy,
    MaxAgeFreshnessPolicy,
    createFreshnessPolicy,
    parseCalendarDate,
    formatCalendarDate,
    EPOCH_FALLBACK,
    type FreshnessPolicy,
} from './freshness.js';
export { CatalogFileStore, type StoredCatalog } from './catalog-file.js';
export { EntityCatalog, emptyCatalog, type EntityCatalogOptions } from './entity-catalog.js';
export { EntityResolver, normalizeName, type ResolverOptions, type CandidateKind } from './resolver.js';
