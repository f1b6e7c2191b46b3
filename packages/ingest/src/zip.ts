/**
 * Minimal zip container reader (stored and deflated entries), enough to
 * open EPUB files. Decompression uses node:zlib.
 */
import { inflateRawSync } from "node:zlib";

const EOCD_SIG = 0x06054b50;
const CENTRAL_SIG = 0x02014b50;
const LOCAL_SIG = 0x04034b50;
const EOCD_MIN = 22;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

export interface ZipEntry {
  readonly name: string;
  readonly method: number;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly localHeaderOffset: number;
}

/** Locate the end-of-central-directory record (it may trail a comment). */
function findEocd(buf: Buffer): number {
  const stop = Math.max(0, buf.length - EOCD_MIN - 0xffff);
  for (let i = buf.length - EOCD_MIN; i >= stop; i--) {
    if (buf.readUInt32LE(i) === EOCD_SIG) return i;
  }
  throw new Error("Not a zip archive: end of central directory not found");
}

/** List entries from the central directory. Throws on a corrupt archive. */
export function readZipEntries(buf: Buffer): ZipEntry[] {
  if (buf.length < EOCD_MIN) {
    throw new Error("Not a zip archive: file too short");
  }
  const eocd = findEocd(buf);
  const count = buf.readUInt16LE(eocd + 10);
  let p = buf.readUInt32LE(eocd + 16);

  const entries: ZipEntry[] = [];
  for (let i = 0; i < count; i++) {
    if (p + 46 > buf.length || buf.readUInt32LE(p) !== CENTRAL_SIG) {
      throw new Error(`Corrupt zip: bad central directory entry ${i}`);
    }
    const nameLen = buf.readUInt16LE(p + 28);
    const extraLen = buf.readUInt16LE(p + 30);
    const commentLen = buf.readUInt16LE(p + 32);
    entries.push({
      name: buf.toString("utf8", p + 46, p + 46 + nameLen),
      method: buf.readUInt16LE(p + 10),
      compressedSize: buf.readUInt32LE(p + 20),
      uncompressedSize: buf.readUInt32LE(p + 24),
      localHeaderOffset: buf.readUInt32LE(p + 42),
    });
    p += 46 + nameLen + extraLen + commentLen;
  }
  return entries;
}

/** Decompressed bytes of one entry. */
export function extractEntry(buf: Buffer, entry: ZipEntry): Buffer {
  const h = entry.localHeaderOffset;
  if (h + 30 > buf.length || buf.readUInt32LE(h) !== LOCAL_SIG) {
    throw new Error(`Corrupt zip: bad local header for "${entry.name}"`);
  }
  const start = h + 30 + buf.readUInt16LE(h + 26) + buf.readUInt16LE(h + 28);
  const data = buf.subarray(start, start + entry.compressedSize);

  let out: Buffer;
  switch (entry.method) {
    case METHOD_STORED: out = data; break;
    case METHOD_DEFLATE: out = inflateRawSync(data); break;
    default:
      throw new Error(`Unsupported zip compression method ${entry.method} for "${entry.name}"`);
  }
  if (out.length !== entry.uncompressedSize) {
    throw new Error(
      `Corrupt zip: "${entry.name}" is ${out.length} bytes, expected ${entry.uncompressedSize}`,
    );
  }
  return out;
}
