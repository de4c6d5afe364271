/**
 * In-memory state of every part a container knows about.
 *
 * A part path that has no entry is "absent": it was never read from the
 * backend nor written by the caller. Present entries are one of:
 * - `cached`: bytes read from the bound backend, with the whole-second
 *   modification time they were read at when the backend has one
 * - `written`: bytes set by the caller; the backend is never consulted again
 * - `deleted`: tombstone, reads must fail
 *
 * @module PartStore
 */

export interface CachedPart {
    state: 'cached';
    data: Buffer;
    /** Whole seconds since the epoch. Missing when the source has no timestamp. */
    mtime?: number;
}

export interface WrittenPart {
    state: 'written';
    data: Buffer;
}

export interface DeletedPart {
    state: 'deleted';
}

export type PartEntry = CachedPart | WrittenPart | DeletedPart;

export type LoadedPart = CachedPart | WrittenPart;

/**
 * Normalizes a part path to the form used as a store key:
 * forward slashes only, no empty segments, no leading `./` or `/`.
 * A trailing slash, which marks a directory placeholder, is kept.
 *
 * @example
 * normalizePartPath('Pictures\\a.png') // 'Pictures/a.png'
 * normalizePartPath('./META-INF//manifest.xml') // 'META-INF/manifest.xml'
 * normalizePartPath('Configurations2/') // 'Configurations2/'
 */
export const normalizePartPath = (partPath: string): string => {
    const isFolder = /[\\/]$/.test(partPath);
    const segments = partPath
        .split(/[\\/]+/)
        .filter(segment => segment !== '' && segment !== '.');
    const joined = segments.join('/');
    return isFolder && joined ? `${joined}/` : joined;
};

export class PartStore {
    private readonly entries = new Map<string, PartEntry>();

    /** Returns the entry for `partPath`, `undefined` when the part is absent. */
    lookup(partPath: string): PartEntry | undefined {
        return this.entries.get(normalizePartPath(partPath));
    }

    has(partPath: string): boolean {
        return this.entries.has(normalizePartPath(partPath));
    }

    cache(partPath: string, data: Buffer, mtime?: number): CachedPart {
        const entry: CachedPart = mtime === undefined
            ? { state: 'cached', data }
            : { state: 'cached', data, mtime };
        this.entries.set(normalizePartPath(partPath), entry);
        return entry;
    }

    /** Stores a loaded entry as it is, e.g. one returned by a backend. */
    put(partPath: string, entry: LoadedPart): void {
        this.entries.set(normalizePartPath(partPath), entry);
    }

    write(partPath: string, data: Buffer): void {
        this.entries.set(normalizePartPath(partPath), { state: 'written', data });
    }

    tombstone(partPath: string): void {
        this.entries.set(normalizePartPath(partPath), { state: 'deleted' });
    }

    /** Forgets the entry, making the part absent again. */
    drop(partPath: string): void {
        this.entries.delete(normalizePartPath(partPath));
    }

    /** Every path with an entry, tombstones included, in insertion order. */
    paths(): string[] {
        return [...this.entries.keys()];
    }

    /** Path and bytes of every part that is not deleted, in insertion order. */
    liveEntries(): Array<[string, Buffer]> {
        const live: Array<[string, Buffer]> = [];
        for (const [partPath, entry] of this.entries) {
            if (entry.state !== 'deleted') live.push([partPath, entry.data]);
        }
        return live;
    }

    /**
     * Structural copy: same paths and states, every byte buffer duplicated.
     * Nothing is shared between the copy and this store.
     */
    clone(): PartStore {
        const copy = new PartStore();
        for (const [partPath, entry] of this.entries) {
            copy.entries.set(partPath, copyEntry(entry));
        }
        return copy;
    }
}

const copyEntry = (entry: PartEntry): PartEntry => {
    switch (entry.state) {
        case 'deleted':
            return { state: 'deleted' };
        case 'written':
            return { state: 'written', data: Buffer.from(entry.data) };
        case 'cached':
            return entry.mtime === undefined
                ? { state: 'cached', data: Buffer.from(entry.data) }
                : { state: 'cached', data: Buffer.from(entry.data), mtime: entry.mtime };
    }
};
