import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { strToU8, zipSync } from 'fflate'
import type { Zippable } from 'fflate'
import yauzl from 'yauzl'

export const TEXT_MIMETYPE = 'application/vnd.oasis.opendocument.text'

export const CONTENT_XML =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<office:document-content xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0" office:version="1.3">' +
  '<office:body><office:text/></office:body></office:document-content>'
export const STYLES_XML =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<office:document-styles xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0" office:version="1.3"/>'
export const META_XML =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<office:document-meta xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0" office:version="1.3"/>'
export const SETTINGS_XML =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<office:document-settings xmlns:office="urn:oasis:names:tc:opendocument:xmlns:office:1.0" office:version="1.3"/>'

export const manifestXml = (mimetype: string, extra: string[] = []): string =>
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<manifest:manifest xmlns:manifest="urn:oasis:names:tc:opendocument:xmlns:manifest:1.0" manifest:version="1.3">' +
  `<manifest:file-entry manifest:full-path="/" manifest:media-type="${mimetype}"/>` +
  '<manifest:file-entry manifest:full-path="content.xml" manifest:media-type="text/xml"/>' +
  '<manifest:file-entry manifest:full-path="styles.xml" manifest:media-type="text/xml"/>' +
  extra.join('') +
  '</manifest:manifest>'

/** Small stand-in for image bytes. */
export const PICTURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01, 0x02])

export interface FixtureOptions {
  /** `null` leaves the mimetype member out. */
  mimetype?: string | null
  withPicture?: boolean
  withManifest?: boolean
}

/**
 * A minimal package: stored mimetype first, the four XML parts, an optional picture, the manifest.
 */
export const buildOdf = (options: FixtureOptions = {}): Buffer => {
  const mimetype = options.mimetype === undefined ? TEXT_MIMETYPE : options.mimetype
  const files: Zippable = {}
  if (mimetype !== null) files['mimetype'] = [strToU8(mimetype), { level: 0 }]
  files['content.xml'] = strToU8(CONTENT_XML)
  files['styles.xml'] = strToU8(STYLES_XML)
  files['meta.xml'] = strToU8(META_XML)
  files['settings.xml'] = strToU8(SETTINGS_XML)
  if (options.withPicture) files['Pictures/a.png'] = PICTURE
  if (options.withManifest !== false) {
    files['META-INF/manifest.xml'] = strToU8(manifestXml(mimetype ?? TEXT_MIMETYPE))
  }
  return Buffer.from(zipSync(files))
}

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'odfpack-'))

export const removeTempDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true })
}

/**
 * Writes an expanded package: one file per part, plus whatever `extra` adds.
 */
export const writeOdfFolder = (folder: string, extra: Record<string, string | Buffer> = {}): void => {
  const parts: Record<string, string | Buffer> = {
    'mimetype': TEXT_MIMETYPE,
    'content.xml': CONTENT_XML,
    'styles.xml': STYLES_XML,
    'meta.xml': META_XML,
    'settings.xml': SETTINGS_XML,
    'META-INF/manifest.xml': manifestXml(TEXT_MIMETYPE),
    ...extra,
  }
  for (const [name, data] of Object.entries(parts)) {
    const file = path.join(folder, ...name.split('/'))
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, data)
  }
}

export interface ArchiveMember {
  fileName: string
  compressionMethod: number
}

/** Member names and compression methods, in archive order. */
export const readArchiveMembers = (bytes: Buffer): Promise<ArchiveMember[]> =>
  new Promise((resolve, reject) => {
    yauzl.fromBuffer(bytes, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) return reject(err ?? new Error('Failed to open zip file'))
      const members: ArchiveMember[] = []
      zipfile.readEntry()
      zipfile.on('entry', (entry: yauzl.Entry) => {
        members.push({ fileName: entry.fileName, compressionMethod: entry.compressionMethod })
        zipfile.readEntry()
      })
      zipfile.on('end', () => resolve(members))
      zipfile.on('error', reject)
    })
  })

export interface LocalHeader {
  flags: number
  compressionMethod: number
  crc32: number
  compressedSize: number
  uncompressedSize: number
  fileName: string
}

/** Fields of the local file header that starts the archive. */
export const readFirstLocalHeader = (bytes: Buffer): LocalHeader => {
  const nameLength = bytes.readUInt16LE(26)
  return {
    flags: bytes.readUInt16LE(6),
    compressionMethod: bytes.readUInt16LE(8),
    crc32: bytes.readUInt32LE(14),
    compressedSize: bytes.readUInt32LE(18),
    uncompressedSize: bytes.readUInt32LE(22),
    fileName: bytes.toString('utf8', 30, 30 + nameLength),
  }
}

/** CRC-32 of every member as recorded in the central directory. */
export const readCentralCrcs = (bytes: Buffer): Promise<Map<string, number>> =>
  new Promise((resolve, reject) => {
    yauzl.fromBuffer(bytes, { lazyEntries: true }, (err, zipfile) => {
      if (err || !zipfile) return reject(err ?? new Error('Failed to open zip file'))
      const crcs = new Map<string, number>()
      zipfile.readEntry()
      zipfile.on('entry', (entry: yauzl.Entry) => {
        crcs.set(entry.fileName, entry.crc32)
        zipfile.readEntry()
      })
      zipfile.on('end', () => resolve(crcs))
      zipfile.on('error', reject)
    })
  })
