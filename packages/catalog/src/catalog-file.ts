/**
 * Catalog File Store
 *
 * JSON file holding { teams, players, timestamp }. Reads never throw: a
 * missing or malformed file reads as null. Entries without an id or a name
 * are dropped on the way in.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Catalog, CatalogEntity, CatalogFile } from '@dugout/types';

const EntitySchema = z.object({
    id: z.number().int(),
    name: z.string().min(1),
});

const FileSchema = z.object({
    teams: z.array(z.unknown()).default([]),
    players: z.array(z.unknown()).default([]),
    timestamp: z.unknown().optional(),
});

export interface StoredCatalog {
    teams: CatalogEntity[];
    players: CatalogEntity[];
    /** Raw timestamp field; validated by the caller */
    timestamp: unknown;
}

export class CatalogFileStore {
    constructor(readonly filePath: string) {}

    exists(): boolean {
        return fs.existsSync(this.filePath);
    }

    read(): StoredCatalog | null {
        if (!this.exists()) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
        } catch (err) {
            console.warn(`[CatalogFileStore] Could not read ${this.filePath}:`, err);
            return null;
        }

        const parsed = FileSchema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`[CatalogFileStore] ${this.filePath} is not a catalog`);
            return null;
        }

        return {
            teams: validEntities(parsed.data.teams),
            players: validEntities(parsed.data.players),
            timestamp: parsed.data.timestamp,
        };
    }

    /**
     * Overwrite the file with a catalog. Returns false when the write fails.
     */
    write(catalog: Catalog): boolean {
        const file: CatalogFile = {
            teams: catalog.teams.map(({ id, name }) => ({ id, name })),
            players: catalog.players.map(({ id, name }) => ({ id, name })),
            timestamp: catalog.fetchedAt,
        };

        try {
            const dir = path.dirname(this.filePath);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
            fs.writeFileSync(this.filePath, JSON.stringify(file, null, 2));
            return true;
        } catch (err) {
            console.error(`[CatalogFileStore] Error writing ${this.filePath}:`, err);
            return false;
        }
    }
}

function validEntities(rows: unknown[]): CatalogEntity[] {
    const entities: CatalogEntity[] = [];
    for (const row of rows) {
        const parsed = EntitySchema.safeParse(row);
        if (parsed.success) {
            entities.push({ id: parsed.data.id, name: parsed.data.name });
        }
    }
    return entities;
}
