/**
 * Folder packaging backend: an expanded ODF package, one file per part.
 *
 * Unlike a ZIP archive, a folder is a live view over the filesystem. A cached
 * part is served again only while the file's modification time, truncated to
 * whole seconds, is the one recorded when it was read. A part whose file has
 * been removed is gone, unless its cached entry never had a file behind it
 * (no `mtime`).
 *
 * @module FolderBackend
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CachedPart } from '../store/PartStore';
import type { Packaging } from '../types';
import type { PartBackend } from './PartBackend';

/** Whole-second modification time, the only staleness signal for folder parts. */
const toTimestamp = (stats: fs.Stats): number => Math.trunc(stats.mtimeMs / 1000);

export class FolderBackend implements PartBackend {
    readonly packaging: Packaging = 'folder';

    constructor(readonly location: string) {}

    async listParts(): Promise<string[]> {
        return this.walk('');
    }

    async loadPart(partPath: string, cached: CachedPart | undefined): Promise<CachedPart | undefined> {
        if (cached) return this.refreshPart(partPath, cached);
        return this.timestamp(partPath) === -1 ? undefined : this.readPart(partPath);
    }

    refreshPart(partPath: string, cached: CachedPart): CachedPart | undefined {
        const current = this.timestamp(partPath);
        if (current === -1) {
            // entries without mtime were never read from disk
            return cached.mtime === undefined ? cached : undefined;
        }
        if (cached.mtime === current) {
            return cached;
        }
        return this.readPart(partPath);
    }

    async loadParts(partPaths: string[]): Promise<Map<string, CachedPart>> {
        const loaded = new Map<string, CachedPart>();
        for (const partPath of partPaths) {
            const part = await this.loadPart(partPath, undefined);
            if (part) loaded.set(partPath, part);
        }
        return loaded;
    }

    /**
     * Reads a part with its timestamp. A directory placeholder reads as empty bytes.
     * @throws {Error} The fs error when the part cannot be read
     */
    readPart(partPath: string): CachedPart {
        const fullPath = this.resolve(partPath);
        const stats = fs.statSync(fullPath);
        const data = stats.isDirectory() ? Buffer.alloc(0) : fs.readFileSync(fullPath);
        return { state: 'cached', data, mtime: toTimestamp(stats) };
    }

    /** Whole-second mtime of a part, or -1 when it cannot be stat'ed. */
    timestamp(partPath: string): number {
        try {
            return toTimestamp(fs.statSync(this.resolve(partPath)));
        } catch {
            return -1;
        }
    }

    private resolve(partPath: string): string {
        const relative = partPath.endsWith('/') ? partPath.slice(0, -1) : partPath;
        return path.join(this.location, ...relative.split('/'));
    }

    /**
     * Recursive listing of `folder` (relative to the package root).
     * Hidden entries are skipped. Files are listed by their POSIX path; a directory
     * is listed as `dir/` only when nothing is listed below it.
     */
    private walk(folder: string): string[] {
        const parts: string[] = [];
        const root = folder ? path.join(this.location, ...folder.split('/')) : this.location;
        const names = fs.readdirSync(root).sort();

        for (const name of names) {
            if (name.startsWith('.')) continue;

            const relativePath = folder ? `${folder}/${name}` : name;
            const stats = fs.statSync(path.join(root, name));
            if (stats.isFile()) {
                parts.push(relativePath);
            } else if (stats.isDirectory()) {
                const subParts = this.walk(relativePath);
                if (subParts.length > 0) {
                    parts.push(...subParts);
                } else {
                    // store leaf directories
                    parts.push(`${relativePath}/`);
                }
            }
        }
        return parts;
    }
}
