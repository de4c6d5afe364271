import type { CachedPart } from '../store/PartStore';
import type { Packaging } from '../types';

/**
 * Storage a container is bound to while it reads parts lazily.
 *
 * A container has at most one backend. A container built from scratch, opened
 * from bytes or produced by `clone` has none: every part already lives in its store.
 */
export interface PartBackend {
    readonly packaging: Packaging;

    /** Absolute path of the archive or folder. */
    readonly location: string;

    /** Live list of the part paths the backend currently holds. */
    listParts(): Promise<string[]>;

    /**
     * Loads one part, applying the backend's caching rule to the entry already cached for it.
     * Resolves to `undefined` when the backend has no such part.
     */
    loadPart(partPath: string, cached: CachedPart | undefined): Promise<CachedPart | undefined>;

    /**
     * Revalidates an entry already cached, without any asynchronous read.
     * Returns the entry to keep, a fresher one, or `undefined` when the part is gone.
     */
    refreshPart(partPath: string, cached: CachedPart): CachedPart | undefined;

    /** Loads several parts at once. Parts the backend does not hold are left out of the result. */
    loadParts(partPaths: string[]): Promise<Map<string, CachedPart>>;
}
