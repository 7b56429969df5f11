/**
 * Dugout Pipeline
 *
 * ensureFresh → resolve → enrich. An unresolved query stops before any
 * upstream stats or news call.
 */

import type { Catalog, DateWindow, MatchMode, ResolvedResolution } from '@dugout/types';
import { EntityResolver, type EntityCatalog } from '@dugout/catalog';
import type { EnrichmentOrchestrator, EnrichmentResult } from './orchestrator.js';

export type LookupResult =
    | { status: 'not_found'; query: string; suggestions: string[] }
    | { status: 'enriched'; resolution: ResolvedResolution; result: EnrichmentResult };

export interface LookupOptions {
    /** Overrides the pipeline's default match mode for this lookup */
    mode?: MatchMode;
    window?: DateWindow;
    requestId?: string;
}

export interface DugoutPipelineDeps {
    catalog: EntityCatalog;
    orchestrator: EnrichmentOrchestrator;
    matchMode: MatchMode;
}

const MAX_SUGGESTIONS = 5;

export class DugoutPipeline {
    private catalog: EntityCatalog;
    private orchestrator: EnrichmentOrchestrator;
    private defaultMode: MatchMode;
    private resolvers = new Map<MatchMode, EntityResolver>();

    constructor(deps: DugoutPipelineDeps) {
        this.catalog = deps.catalog;
        this.orchestrator = deps.orchestrator;
        this.defaultMode = deps.matchMode;
    }

    async lookup(query: string, options: LookupOptions = {}): Promise<LookupResult> {
        const catalog = await this.catalog.ensureFresh();
        const resolver = this.resolverFor(options.mode || this.defaultMode);
        const resolution = resolver.resolve(query, catalog);

        if (resolution.status === 'not_found') {
            console.log(`[DugoutPipeline] No entity matches "${query}" (${resolver.mode} mode)`);
            return { status: 'not_found', query, suggestions: this.suggest(query, catalog) };
        }

        const result = await this.orchestrator.enrich(resolution.entity, {
            window: options.window,
            requestId: options.requestId,
        });

        return { status: 'enriched', resolution, result };
    }

    /**
     * Substring candidates for a query that did not resolve, so callers can
     * offer a choice instead of a bare failure.
     */
    private suggest(query: string, catalog: Catalog): string[] {
        return this.resolverFor('substring')
            .resolveAll(query, catalog)
            .slice(0, MAX_SUGGESTIONS)
            .map(c => c.name);
    }

    private resolverFor(mode: MatchMode): EntityResolver {
        let resolver = this.resolvers.get(mode);
        if (!resolver) {
            resolver = new EntityResolver({ mode });
            this.resolvers.set(mode, resolver);
        }
        return resolver;
    }
}
