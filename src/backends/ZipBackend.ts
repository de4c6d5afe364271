/**
 * ZIP packaging backend.
 *
 * An archive bound by path is treated as immutable once opened: a part read
 * from it is cached and never re-read. Each read re-opens the archive, so no
 * file descriptor outlives a call.
 *
 * @module ZipBackend
 */

import { normalizePartPath } from '../store/PartStore';
import type { CachedPart } from '../store/PartStore';
import type { OdfContainerConfig, Packaging } from '../types';
import { getWrappedError, isCorruptionError, logWarning } from '../utils/errorUtils';
import { extractFiles, listEntries } from '../utils/zipUtils';
import type { ZipFileContent } from '../utils/zipUtils';
import type { PartBackend } from './PartBackend';

export class ZipBackend implements PartBackend {
    readonly packaging: Packaging = 'zip';

    constructor(readonly location: string, private readonly config: OdfContainerConfig) {}

    async listParts(): Promise<string[]> {
        try {
            const names = await listEntries(this.location);
            return names.map(normalizePartPath);
        } catch (error) {
            throw getWrappedError(error, this.config, this.location);
        }
    }

    async loadPart(partPath: string, cached: CachedPart | undefined): Promise<CachedPart | undefined> {
        if (cached) return cached;

        const members = await this.readMembers(name => name === partPath);
        if (!members) return undefined;
        const member = members.find(file => normalizePartPath(file.path) === partPath);
        return member ? { state: 'cached', data: member.content } : undefined;
    }

    refreshPart(_partPath: string, cached: CachedPart): CachedPart {
        return cached;
    }

    async loadParts(partPaths: string[]): Promise<Map<string, CachedPart>> {
        const wanted = new Set(partPaths);
        const loaded = new Map<string, CachedPart>();
        const members = await this.readMembers(name => wanted.has(name));
        for (const member of members ?? []) {
            loaded.set(normalizePartPath(member.path), { state: 'cached', data: member.content });
        }
        return loaded;
    }

    /**
     * Reads the members whose normalized name passes `filterFn`.
     * A corrupt archive is reported as a warning and resolves to `undefined`.
     */
    private async readMembers(filterFn: (partPath: string) => boolean): Promise<ZipFileContent[] | undefined> {
        try {
            return await extractFiles(this.location, name => filterFn(normalizePartPath(name)));
        } catch (error) {
            if (isCorruptionError(error)) {
                logWarning(`Cannot read parts of corrupted archive ${this.location}`, this.config, error);
                return undefined;
            }
            throw getWrappedError(error, this.config, this.location);
        }
    }
}

/**
 * Reads every member of an in-memory archive.
 * Used for sources that cannot be read again later, so a corrupt archive is a hard error here.
 *
 * @param bytes - The whole archive
 * @returns Normalized part paths and their bytes, in archive order
 */
export const readWholeArchive = async (bytes: Buffer, config: OdfContainerConfig): Promise<Array<[string, Buffer]>> => {
    try {
        const files = await extractFiles(bytes, () => true);
        return files.map((file): [string, Buffer] => [normalizePartPath(file.path), file.content]);
    } catch (error) {
        throw getWrappedError(error, config, '<in-memory archive>');
    }
};
