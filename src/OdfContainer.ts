/**
 * ODF Container - Main Entry Point
 *
 * This module provides the `OdfContainer` class: an ODF package seen as a
 * collection of named parts (`mimetype`, `content.xml`, `Pictures/logo.png`, ...),
 * backed either by a ZIP archive or by an expanded folder.
 *
 * **Sources:**
 * - A path to a ZIP package: parts are read lazily, one archive open per read
 * - A path to a folder: parts are read lazily and refreshed when the file changes on disk
 * - A Buffer, ArrayBuffer or readable stream: the whole archive is read at open time
 * - Nothing (`new OdfContainer()`): an empty package, built part by part
 *
 * Writes (`setPart`, `delPart`) only ever touch memory; nothing reaches the
 * disk before `save`.
 *
 * **Usage:**
 * ```typescript
 * import { OdfContainer } from 'odfpack';
 *
 * const container = await OdfContainer.open('report.odt');
 * const content = await container.getPart('content.xml');
 * container.setPart('content.xml', patched);
 *
 * // Expand it next to the original, as report.folder/
 * await container.save('report', { packaging: 'folder' });
 * ```
 *
 * @module OdfContainer
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import concat from 'concat-stream';
import { FolderBackend } from './backends/FolderBackend';
import type { PartBackend } from './backends/PartBackend';
import { readWholeArchive, ZipBackend } from './backends/ZipBackend';
import {
    FOLDER_SUFFIX,
    isOdfMimeType,
    ODF_EXTENSIONS,
    ODF_MANIFEST,
    ODF_MIMETYPE,
    ODF_XML_PARTS,
    PACKAGINGS,
} from './constants';
import { Manifest } from './Manifest';
import { normalizePartPath, PartStore } from './store/PartStore';
import type { CachedPart } from './store/PartStore';
import type { ContainerSource, OdfContainerConfig, Packaging, SaveOptions, SaveTarget } from './types';
import { getOdfError, getWrappedError, logWarning, OdfErrorType } from './utils/errorUtils';
import { createZip, extractFiles, isZipFile } from './utils/zipUtils';
import type { ZipEntryInput, ZipFileContent } from './utils/zipUtils';

const SPECIAL_ZIP_PARTS: ReadonlySet<string> = new Set([ODF_MIMETYPE, ODF_MANIFEST, ...ODF_XML_PARTS]);

const isPackaging = (value: string): value is Packaging => PACKAGINGS.some(packaging => packaging === value);

const expandHome = (source: string): string => {
    if (source === '~') return os.homedir();
    if (source.startsWith('~/') || source.startsWith(`~${path.sep}`)) {
        return path.join(os.homedir(), source.slice(2));
    }
    return source;
};

const isDirectory = (location: string): boolean => {
    try {
        return fs.statSync(location).isDirectory();
    } catch {
        return false;
    }
};

const readStream = (stream: Readable): Promise<Buffer> => {
    return new Promise((resolve, reject) => {
        stream.on('error', reject);
        stream.pipe(concat({ encoding: 'buffer' }, (data: Buffer) => resolve(data)));
    });
};

const writeToStream = (stream: Writable, data: Buffer): Promise<void> => {
    return new Promise((resolve, reject) => {
        stream.write(data, (err) => (err ? reject(err) : resolve()));
    });
};

/**
 * An ODF package as a mutable collection of parts.
 *
 * A container is bound to at most one backend (ZIP archive or folder). It is not
 * safe to use one container from concurrent tasks; give each worker its own
 * container, or its own `clone()`.
 */
export class OdfContainer {
    private store = new PartStore();
    private backend: PartBackend | undefined;
    private packagingKind: Packaging = 'zip';
    private sourcePath: string | undefined;
    private readonly config: Required<OdfContainerConfig>;

    /**
     * Creates an empty, in-memory container. Use `OdfContainer.open` to read an existing package.
     *
     * @param config - Optional configuration object (defaults applied for all omitted options)
     */
    constructor(config: OdfContainerConfig = {}) {
        this.config = {
            outputErrorToConsole: true,
            ...config
        };
    }

    /**
     * Opens an ODF package.
     *
     * This method:
     * 1. Resolves a string source to an absolute path (`~` is expanded)
     * 2. Detects a ZIP archive from its local file header signature
     * 3. Binds a ZIP backend to a path, or reads an in-memory archive completely
     * 4. Otherwise binds a folder backend to a directory
     * 5. Checks that the `mimetype` part is a known ODF media type
     *
     * @param source - Path to a package file or folder, the package bytes, or a readable stream
     * @param config - Optional configuration object
     * @throws {OdfError} `FILE_DOES_NOT_EXIST`, `INVALID_INPUT`, `FILE_CORRUPTED`,
     *                    `MIMETYPE_MISSING` or `UNKNOWN_MIMETYPE`
     *
     * @example
     * ```typescript
     * const fromPath = await OdfContainer.open('slides.odp');
     * const fromFolder = await OdfContainer.open('slides.folder');
     * const fromBytes = await OdfContainer.open(fs.readFileSync('slides.odp'));
     * ```
     */
    public static async open(source: ContainerSource, config?: OdfContainerConfig): Promise<OdfContainer> {
        const container = new OdfContainer(config);
        await container.load(source);
        return container;
    }

    /**
     * Opens a template package (`.ott`, `.ots`, `.otp`, ...) and returns an unbound copy of it
     * turned into a regular document: `-template` is dropped from the mimetype, in the
     * `mimetype` part and in the manifest's root entry.
     */
    public static async fromTemplate(source: ContainerSource, config?: OdfContainerConfig): Promise<OdfContainer> {
        const template = await OdfContainer.open(source, config);
        const container = await template.clone();

        const mimetype = container.mimetype.replace('-template', '');
        container.mimetype = mimetype;

        const manifest = await Manifest.fromContainer(container, container.config);
        if (manifest) {
            manifest.setMediaType('/', mimetype);
            manifest.saveTo(container);
        } else {
            logWarning(`Missing '${ODF_MANIFEST}' in template`, container.config);
        }
        return container;
    }

    /** Absolute path of the bound archive or folder; undefined for in-memory containers and clones. */
    get path(): string | undefined {
        return this.sourcePath;
    }

    /** Packaging the container was opened with, and the default packaging of `save`. */
    get packaging(): Packaging {
        return this.packagingKind;
    }

    /**
     * The decoded `mimetype` part, or an empty string when the container has none.
     * A folder-packaged container checks the file's mtime first, as `getPart` does.
     */
    get mimetype(): string {
        let entry = this.store.lookup(ODF_MIMETYPE);
        if (entry?.state === 'cached' && this.backend) {
            const refreshed = this.backend.refreshPart(ODF_MIMETYPE, entry);
            if (refreshed !== entry) {
                this.keep(ODF_MIMETYPE, refreshed);
                entry = refreshed;
            }
        }
        return entry && entry.state !== 'deleted' ? entry.data.toString('utf8') : '';
    }

    /**
     * Replaces the `mimetype` part.
     * @throws {OdfError} `INVALID_MIMETYPE_VALUE` for anything but a string or bytes
     */
    set mimetype(value: string | Buffer | Uint8Array) {
        if (typeof value === 'string') {
            this.store.write(ODF_MIMETYPE, Buffer.from(value, 'utf8'));
        } else if (value instanceof Uint8Array) {
            this.store.write(ODF_MIMETYPE, Buffer.from(value));
        } else {
            throw getOdfError(OdfErrorType.INVALID_MIMETYPE_VALUE, this.config, String(value));
        }
    }

    /**
     * Returns the bytes of a part, or `undefined` when the container has no such part.
     *
     * Bytes set with `setPart` are returned as they are. Otherwise:
     * - ZIP: a part read once is served from memory; the archive is never read again for it
     * - folder: the cached bytes are served while the file's mtime (whole seconds) is unchanged
     *
     * @throws {OdfError} `PART_DELETED` when the part was deleted with `delPart`
     */
    async getPart(partPath: string): Promise<Buffer | undefined> {
        const key = normalizePartPath(partPath);
        const entry = this.store.lookup(key);

        let cached: CachedPart | undefined;
        if (entry) {
            switch (entry.state) {
                case 'deleted':
                    throw getOdfError(OdfErrorType.PART_DELETED, this.config, key);
                case 'written':
                    return entry.data;
                case 'cached':
                    cached = entry;
                    break;
            }
        }

        if (!this.backend) return cached?.data;

        const loaded = await this.backend.loadPart(key, cached);
        if (loaded !== cached) this.keep(key, loaded);
        return loaded?.data;
    }

    /**
     * Adds or replaces a part. Strings are stored UTF-8 encoded.
     * Nothing is written to the backend before `save`.
     */
    setPart(partPath: string, data: Buffer | Uint8Array | string): void {
        let bytes: Buffer;
        if (typeof data === 'string') {
            bytes = Buffer.from(data, 'utf8');
        } else if (Buffer.isBuffer(data)) {
            bytes = data;
        } else {
            bytes = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
        }
        this.store.write(partPath, bytes);
    }

    /** Marks a part for deletion. Reading it afterwards throws; `save` leaves it out. */
    delPart(partPath: string): void {
        this.store.tombstone(partPath);
    }

    /**
     * Lists the part paths.
     *
     * Without a bound archive or folder this is every path the container has an entry for.
     * Otherwise the list is read again from the backend on each call: the ZIP central
     * directory, or a walk of the folder where leaf directories appear as `dir/`.
     */
    async getParts(): Promise<string[]> {
        if (!this.backend) return this.store.paths();
        return this.backend.listParts();
    }

    /**
     * Saves the container.
     *
     * Every part the backend lists but that was never read is loaded first, so that
     * nothing is lost when the target is the source itself or uses another packaging.
     *
     * **Folder packaging** writes `<target>.folder/`, replacing any existing folder
     * (or moving it to `<stem>.backup.folder` with `backup`). Files get mode 0666.
     *
     * **ZIP packaging** writes `mimetype` first and STORED, then `content.xml`, `meta.xml`,
     * `settings.xml`, `styles.xml`, then every other part, then `META-INF/manifest.xml`.
     * A stream target receives the archive bytes and is left open.
     *
     * @param target - Path or writable stream; defaults to the path the container was opened from.
     *                 Trailing separators and a `.folder` suffix are stripped.
     * @param options - Packaging override and backup flag
     * @throws {OdfError} `PACKAGING_UNSUPPORTED`, `FOLDER_TO_STREAM`, `MIMETYPE_MISSING` (ZIP),
     *                    or `IMPROPER_ARGUMENTS` when there is no target at all
     *
     * @example
     * ```typescript
     * await container.save();                                    // back to the source
     * await container.save('copy.odt', { backup: true });       // copy.backup.odt keeps the old file
     * await container.save('copy', { packaging: 'folder' });    // copy.folder/
     * ```
     */
    async save(target?: SaveTarget, options: SaveOptions = {}): Promise<void> {
        const packaging = this.resolvePackaging(options.packaging);
        await this.materialize();
        const cleanTarget = this.cleanSaveTarget(target);

        if (packaging === 'folder') {
            if (typeof cleanTarget !== 'string') {
                throw getOdfError(OdfErrorType.FOLDER_TO_STREAM, this.config, 'a stream');
            }
            this.saveAsFolder(cleanTarget, options.backup ?? false);
            return;
        }

        if (typeof cleanTarget === 'string') {
            if (options.backup) this.backup(cleanTarget);
            fs.writeFileSync(cleanTarget, this.serializeZip());
        } else {
            await writeToStream(cleanTarget, this.serializeZip());
        }
    }

    /**
     * Returns the ZIP packaging of the container in memory.
     * @throws {OdfError} `MIMETYPE_MISSING`
     */
    async toBuffer(): Promise<Buffer> {
        await this.materialize();
        return this.serializeZip();
    }

    /**
     * Returns an independent copy of the container.
     *
     * Every part is loaded from the backend first; the copy holds its own bytes,
     * has no backend and no path, so saving it never writes over the original.
     */
    async clone(): Promise<OdfContainer> {
        await this.materialize();
        const copy = new OdfContainer(this.config);
        copy.store = this.store.clone();
        copy.packagingKind = this.packagingKind;
        return copy;
    }

    toString(): string {
        return `<OdfContainer type=${this.mimetype} path=${this.sourcePath ?? 'none'}>`;
    }

    private async load(source: ContainerSource): Promise<void> {
        if (typeof source === 'string') {
            const location = path.resolve(expandHome(source));
            if (!fs.existsSync(location)) {
                throw getOdfError(OdfErrorType.FILE_DOES_NOT_EXIST, this.config, location);
            }
            if (isZipFile(location)) {
                await this.loadZipFile(location);
            } else if (isDirectory(location)) {
                this.loadFolder(location);
            } else {
                throw getOdfError(OdfErrorType.INVALID_INPUT, this.config, `file ${location}`);
            }
            return;
        }

        let bytes: Buffer;
        if (Buffer.isBuffer(source)) {
            bytes = source;
        } else if (source instanceof Uint8Array) {
            bytes = Buffer.from(source);
        } else if (source instanceof ArrayBuffer) {
            bytes = Buffer.from(source);
        } else if (source instanceof Readable) {
            bytes = await readStream(source);
        } else {
            throw getOdfError(OdfErrorType.INVALID_INPUT, this.config, typeof source);
        }

        if (!isZipFile(bytes)) {
            throw getOdfError(OdfErrorType.INVALID_INPUT, this.config, 'in-memory data that is not a ZIP archive');
        }
        await this.loadZipBytes(bytes);
    }

    private async loadZipFile(location: string): Promise<void> {
        let members: ZipFileContent[];
        try {
            members = await extractFiles(location, name => name === ODF_MIMETYPE);
        } catch (error) {
            throw getWrappedError(error, this.config, location);
        }
        const mimetype = members.find(member => member.path === ODF_MIMETYPE)?.content;
        this.checkMimetype(mimetype, location);

        this.reset(new ZipBackend(location, this.config));
        this.store.cache(ODF_MIMETYPE, mimetype);
    }

    private async loadZipBytes(bytes: Buffer): Promise<void> {
        const parts = await readWholeArchive(bytes, this.config);
        const mimetype = parts.find(([partPath]) => partPath === ODF_MIMETYPE)?.[1];
        this.checkMimetype(mimetype, 'in-memory archive');

        this.reset(undefined);
        for (const [partPath, data] of parts) {
            this.store.cache(partPath, data);
        }
    }

    private loadFolder(location: string): void {
        const backend = new FolderBackend(location);
        let mimetype: CachedPart;
        try {
            mimetype = backend.readPart(ODF_MIMETYPE);
        } catch (error) {
            logWarning('Corrupted or not an OpenDocument folder (missing mimetype)', this.config, error);
            // no mtime: read from disk as soon as a mimetype file shows up
            mimetype = { state: 'cached', data: Buffer.from(ODF_EXTENSIONS.odt, 'utf8') };
        }
        this.checkMimetype(mimetype.data, location);

        this.reset(backend);
        this.store.put(ODF_MIMETYPE, mimetype);
    }

    private checkMimetype(data: Buffer | undefined, location: string): asserts data is Buffer {
        if (!data) {
            throw getOdfError(OdfErrorType.MIMETYPE_MISSING, this.config, location);
        }
        const mimetype = data.toString('utf8');
        if (!isOdfMimeType(mimetype)) {
            throw getOdfError(OdfErrorType.UNKNOWN_MIMETYPE, this.config, mimetype);
        }
    }

    /** Binds the container to `backend`; without one it holds an in-memory ZIP package. */
    private reset(backend: PartBackend | undefined): void {
        this.store = new PartStore();
        this.backend = backend;
        this.packagingKind = backend?.packaging ?? 'zip';
        this.sourcePath = backend?.location;
    }

    /** Stores what the backend returned for a cached part; `undefined` means the part is gone. */
    private keep(partPath: string, entry: CachedPart | undefined): void {
        if (entry) {
            this.store.put(partPath, entry);
        } else {
            this.store.drop(partPath);
        }
    }

    /** Loads every part the backend lists and the store has no entry for. */
    private async materialize(): Promise<void> {
        if (!this.backend) return;
        const missing = (await this.backend.listParts()).filter(partPath => !this.store.has(partPath));
        if (missing.length === 0) return;
        const loaded = await this.backend.loadParts(missing);
        for (const [partPath, entry] of loaded) {
            this.store.put(partPath, entry);
        }
    }

    private resolvePackaging(requested: string | undefined): Packaging {
        const packaging = (requested || this.packagingKind).trim().toLowerCase();
        if (!isPackaging(packaging)) {
            throw getOdfError(OdfErrorType.PACKAGING_UNSUPPORTED, this.config, packaging);
        }
        return packaging;
    }

    private cleanSaveTarget(target: SaveTarget | undefined): SaveTarget {
        const resolved = target ?? this.sourcePath;
        if (resolved === undefined) {
            throw getOdfError(OdfErrorType.IMPROPER_ARGUMENTS, this.config, 'no save target and the container has no path');
        }
        if (typeof resolved !== 'string') return resolved;

        let cleaned = resolved;
        while (cleaned.length > 1 && (cleaned.endsWith('/') || cleaned.endsWith(path.sep))) {
            cleaned = cleaned.slice(0, -1);
        }
        while (cleaned.endsWith(FOLDER_SUFFIX) && cleaned.length > FOLDER_SUFFIX.length) {
            cleaned = cleaned.slice(0, -FOLDER_SUFFIX.length);
        }
        return cleaned;
    }

    private saveAsFolder(target: string, backup: boolean): void {
        const folder = target + FOLDER_SUFFIX;
        if (backup) {
            this.backup(folder);
        } else {
            this.unlink(folder);
        }

        for (const [partPath, data] of this.store.liveEntries()) {
            if (partPath.endsWith('/')) {
                fs.mkdirSync(path.join(folder, ...partPath.slice(0, -1).split('/')), { recursive: true });
                continue;
            }
            const filePath = path.join(folder, ...partPath.split('/'));
            fs.mkdirSync(path.dirname(filePath), { recursive: true });
            fs.writeFileSync(filePath, data);
            fs.chmodSync(filePath, 0o666);
        }
    }

    private serializeZip(): Buffer {
        const live = new Map(this.store.liveEntries());
        const entries: ZipEntryInput[] = [];

        if (!live.has(ODF_MANIFEST)) {
            logWarning(`Missing '${ODF_MANIFEST}'`, this.config);
        }

        // mimetype must be first and uncompressed
        const mimetype = live.get(ODF_MIMETYPE);
        if (!mimetype) {
            throw getOdfError(OdfErrorType.MIMETYPE_MISSING, this.config, this.sourcePath ?? 'the container');
        }
        entries.push({ path: ODF_MIMETYPE, content: mimetype, store: true });

        for (const partPath of ODF_XML_PARTS) {
            const data = live.get(partPath);
            if (!data) {
                logWarning(`Missing '${partPath}'`, this.config);
                continue;
            }
            entries.push({ path: partPath, content: data });
        }

        for (const [partPath, data] of live) {
            if (SPECIAL_ZIP_PARTS.has(partPath)) continue;
            entries.push({ path: partPath, content: data });
        }

        const manifest = live.get(ODF_MANIFEST);
        if (manifest) entries.push({ path: ODF_MANIFEST, content: manifest });

        return createZip(entries);
    }

    /** Moves `target` aside to `<stem>.backup<suffix>` in the same directory. */
    private backup(target: string): void {
        if (!fs.existsSync(target)) return;

        const { dir, name, ext } = path.parse(target);
        const backupPath = path.join(dir, `${name}.backup${ext}`);
        if (isDirectory(backupPath)) {
            try {
                fs.rmSync(backupPath, { recursive: true, force: true });
            } catch (error) {
                logWarning(`Cannot remove previous backup ${backupPath}`, this.config, error);
            }
        }
        try {
            fs.renameSync(target, backupPath);
        } catch (error) {
            logWarning(`Cannot back up ${target} to ${backupPath}`, this.config, error);
        }
    }

    private unlink(target: string): void {
        if (!fs.existsSync(target)) return;
        try {
            fs.rmSync(target, { recursive: true, force: true });
        } catch (error) {
            logWarning(`Cannot remove ${target}`, this.config, error);
        }
    }
}
