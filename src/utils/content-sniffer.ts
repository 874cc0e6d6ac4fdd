/** Only this many leading bytes are considered when sniffing. */
export const SNIFF_LENGTH = 512;

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";
const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

/**
 * Markup openers recognised after leading whitespace. Matching ignores ASCII
 * case and requires the next byte to close the tag name (space or `>`).
 */
const HTML_OPENERS = [
  "<!DOCTYPE HTML",
  "<HTML",
  "<HEAD",
  "<SCRIPT",
  "<IFRAME",
  "<H1",
  "<DIV",
  "<FONT",
  "<TABLE",
  "<A",
  "<STYLE",
  "<TITLE",
  "<B",
  "<BODY",
  "<BR",
  "<P",
  "<!--",
].map((opener) => Buffer.from(opener, "latin1"));

const XML_OPENER = Buffer.from("<?xml", "latin1");

interface MagicSignature {
  mimeType: string;
  pattern: Buffer;
  /** Bits of each byte that take part in the comparison; all when absent. */
  mask?: Buffer;
}

/** A format recognised by inspecting its structure rather than a fixed prefix. */
interface StructuralSignature {
  mimeType: string;
  matches: (data: Buffer) => boolean;
}

type Signature = MagicSignature | StructuralSignature;

function bytes(...values: Array<number | string>): Buffer {
  return Buffer.concat(
    values.map((v) =>
      typeof v === "string" ? Buffer.from(v, "latin1") : Buffer.from([v]),
    ),
  );
}

// RIFF-style containers carry a length in bytes 4..7
const RIFF_MASK = bytes(
  0xff, 0xff, 0xff, 0xff,
  0x00, 0x00, 0x00, 0x00,
  0xff, 0xff, 0xff, 0xff,
);

/**
 * Magic-byte signatures checked in order; the first match wins.
 */
const MAGIC_SIGNATURES: Signature[] = [
  { mimeType: "application/pdf", pattern: bytes("%PDF-") },
  { mimeType: "application/postscript", pattern: bytes("%!PS-Adobe-") },
  {
    mimeType: "text/plain; charset=utf-16be",
    pattern: bytes(0xfe, 0xff, 0, 0),
    mask: bytes(0xff, 0xff, 0, 0),
  },
  {
    mimeType: "text/plain; charset=utf-16le",
    pattern: bytes(0xff, 0xfe, 0, 0),
    mask: bytes(0xff, 0xff, 0, 0),
  },
  { mimeType: "text/plain; charset=utf-8", pattern: bytes(0xef, 0xbb, 0xbf) },
  { mimeType: "image/x-icon", pattern: bytes(0, 0, 1, 0) },
  { mimeType: "image/x-icon", pattern: bytes(0, 0, 2, 0) },
  { mimeType: "image/bmp", pattern: bytes("BM") },
  { mimeType: "image/gif", pattern: bytes("GIF87a") },
  { mimeType: "image/gif", pattern: bytes("GIF89a") },
  {
    mimeType: "image/webp",
    pattern: bytes("RIFF", 0, 0, 0, 0, "WEBPVP"),
    mask: Buffer.concat([RIFF_MASK, bytes(0xff, 0xff)]),
  },
  {
    mimeType: "image/png",
    pattern: bytes(0x89, "PNG", 0x0d, 0x0a, 0x1a, 0x0a),
  },
  { mimeType: "image/jpeg", pattern: bytes(0xff, 0xd8, 0xff) },
  {
    mimeType: "audio/wave",
    pattern: bytes("RIFF", 0, 0, 0, 0, "WAVE"),
    mask: RIFF_MASK,
  },
  {
    mimeType: "audio/aiff",
    pattern: bytes("FORM", 0, 0, 0, 0, "AIFF"),
    mask: RIFF_MASK,
  },
  { mimeType: "audio/basic", pattern: bytes(".snd") },
  { mimeType: "application/ogg", pattern: bytes("OggS", 0) },
  { mimeType: "audio/midi", pattern: bytes("MThd", 0, 0, 0, 6) },
  { mimeType: "audio/mpeg", pattern: bytes("ID3") },
  {
    mimeType: "video/avi",
    pattern: bytes("RIFF", 0, 0, 0, 0, "AVI "),
    mask: RIFF_MASK,
  },
  { mimeType: "video/mp4", matches: isMp4 },
  { mimeType: "video/webm", pattern: bytes(0x1a, 0x45, 0xdf, 0xa3) },
  {
    // Embedded OpenType: "LP" magic after a 34-byte header of sizes and versions
    mimeType: "application/vnd.ms-fontobject",
    pattern: Buffer.concat([Buffer.alloc(34), bytes("LP")]),
    mask: Buffer.concat([Buffer.alloc(34), bytes(0xff, 0xff)]),
  },
  { mimeType: "font/ttf", pattern: bytes(0, 1, 0, 0) },
  { mimeType: "font/otf", pattern: bytes("OTTO") },
  { mimeType: "font/collection", pattern: bytes("ttcf") },
  { mimeType: "font/woff", pattern: bytes("wOFF") },
  { mimeType: "font/woff2", pattern: bytes("wOF2") },
  { mimeType: "application/x-gzip", pattern: bytes(0x1f, 0x8b, 0x08) },
  { mimeType: "application/zip", pattern: bytes("PK", 0x03, 0x04) },
  {
    mimeType: "application/x-rar-compressed",
    pattern: bytes("Rar!", 0x1a, 0x07, 0x00),
  },
  {
    mimeType: "application/x-rar-compressed",
    pattern: bytes("Rar!", 0x1a, 0x07, 0x01, 0x00),
  },
  { mimeType: "application/wasm", pattern: bytes(0, "asm") },
];

/**
 * Determines the MIME type of a payload from its leading bytes. The result
 * never depends on a file name; unrecognised binary data yields
 * `application/octet-stream`.
 */
export function detectContentType(content: Buffer): string {
  const data = content.subarray(0, SNIFF_LENGTH);
  const firstNonWs = skipWhitespace(data);

  for (const opener of HTML_OPENERS) {
    if (matchesMarkup(data, firstNonWs, opener)) {
      return "text/html; charset=utf-8";
    }
  }

  if (startsWith(data.subarray(firstNonWs), XML_OPENER)) {
    return "text/xml; charset=utf-8";
  }

  const signature = MAGIC_SIGNATURES.find((sig) =>
    "matches" in sig ? sig.matches(data) : matchesSignature(data, sig),
  );
  if (signature) return signature.mimeType;

  return isText(data.subarray(firstNonWs))
    ? TEXT_CONTENT_TYPE
    : DEFAULT_CONTENT_TYPE;
}

// ── helpers ──

function isWhitespace(b: number): boolean {
  // \t \n \f \r and space
  return b === 0x09 || b === 0x0a || b === 0x0c || b === 0x0d || b === 0x20;
}

function skipWhitespace(data: Buffer): number {
  let i = 0;
  while (i < data.length && isWhitespace(data[i])) i++;
  return i;
}

function startsWith(data: Buffer, prefix: Buffer): boolean {
  return (
    data.length >= prefix.length &&
    data.subarray(0, prefix.length).equals(prefix)
  );
}

function matchesMarkup(data: Buffer, offset: number, opener: Buffer): boolean {
  const candidate = data.subarray(offset);
  if (candidate.length < opener.length + 1) return false;

  for (let i = 0; i < opener.length; i++) {
    let b = candidate[i];
    const expected = opener[i];
    // Fold lowercase ASCII letters only where the opener has a letter
    if (expected >= 0x41 && expected <= 0x5a) b &= 0xdf;
    if (b !== expected) return false;
  }

  const terminator = candidate[opener.length];
  return terminator === 0x20 || terminator === 0x3e;
}

function matchesSignature(data: Buffer, sig: MagicSignature): boolean {
  if (data.length < sig.pattern.length) return false;
  if (!sig.mask) return startsWith(data, sig.pattern);

  for (let i = 0; i < sig.pattern.length; i++) {
    if ((data[i] & sig.mask[i]) !== sig.pattern[i]) return false;
  }
  return true;
}

const MP4_BOX_TYPE = bytes("ftyp");
const MP4_BRAND = bytes("mp4");

/**
 * An ISO media file opens with an `ftyp` box: a big-endian box size, the box
 * type, a major brand, a minor version and then compatible brands, all in
 * 4-byte slots. Any brand beginning with "mp4" marks an MP4 file.
 */
function isMp4(data: Buffer): boolean {
  if (data.length < 12) return false;

  const boxSize = data.readUInt32BE(0);
  if (data.length < boxSize || boxSize % 4 !== 0) return false;
  if (!data.subarray(4, 8).equals(MP4_BOX_TYPE)) return false;

  for (let offset = 8; offset < boxSize; offset += 4) {
    if (offset === 12) continue; // minor version
    if (data.subarray(offset, offset + 3).equals(MP4_BRAND)) return true;
  }
  return false;
}

function isText(data: Buffer): boolean {
  for (const b of data) {
    if (
      b <= 0x08 ||
      b === 0x0b ||
      (b >= 0x0e && b <= 0x1a) ||
      (b >= 0x1c && b <= 0x1f)
    ) {
      return false;
    }
  }
  return true;
}
