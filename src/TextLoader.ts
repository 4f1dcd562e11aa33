// file: src/TextLoader.ts
// Reads source files in whatever encoding they were saved in and writes them back the same way
import { isUtf8 } from 'buffer';
import * as fs from 'fs/promises';
import * as chardet from 'chardet';
import * as iconv from 'iconv-lite';

/**
 * How a file's text was laid out on disk, so it can be written back identically.
 */
export interface TextLayout {
  /** Terminator of each physical line as read; '' for a last line without one. */
  terminators: string[];
  /** Terminator for lines that have no source line to copy one from. */
  eol: string;
  /** Encoding name understood by iconv-lite, or 'utf-8'. */
  encoding: string;
  /** Whether the file started with a byte order mark. */
  bom: boolean;
}

export interface LoadedText {
  /** Physical lines without terminators. */
  lines: string[];
  layout: TextLayout;
}

export interface DecodedText {
  text: string;
  encoding: string;
  bom: boolean;
}

// chardet only needs the start of the file to make a guess
const SNIFF_BYTES = 4096;
const FALLBACK_ENCODING = 'latin1';

/**
 * Decodes with `encoding` only if encoding the result gives back the same
 * bytes, so a later write leaves untouched lines byte-identical.
 */
function decodeExactly(buffer: Buffer, encoding: string): DecodedText | null {
  const raw = iconv.decode(buffer, encoding, { stripBOM: false });
  const bom = raw.startsWith('\uFEFF');
  const text = bom ? raw.slice(1) : raw;
  return iconv.encode(text, encoding, { addBOM: bom }).equals(buffer) ? { text, encoding, bom } : null;
}

/**
 * Decodes file contents. Valid UTF-8 is taken as is; anything else is sniffed
 * with chardet and decoded with iconv-lite when the guess round-trips, falling
 * back to latin1, which maps every byte to one character and back.
 */
export function decodeText(buffer: Buffer): DecodedText {
  if (isUtf8(buffer)) {
    const bom = buffer.length >= 3 && buffer[0] === 0xef && buffer[1] === 0xbb && buffer[2] === 0xbf;
    return { text: buffer.toString('utf8', bom ? 3 : 0), encoding: 'utf-8', bom };
  }
  const detected = chardet.detect(buffer.subarray(0, SNIFF_BYTES))?.toLowerCase();
  if (detected && detected !== 'utf-8' && iconv.encodingExists(detected)) {
    const decoded = decodeExactly(buffer, detected);
    if (decoded) {
      return decoded;
    }
  }
  return { text: iconv.decode(buffer, FALLBACK_ENCODING), encoding: FALLBACK_ENCODING, bom: false };
}

/**
 * Encodes text in the layout's encoding, restoring the byte order mark if there was one.
 */
export function encodeText(text: string, layout: Pick<TextLayout, 'encoding' | 'bom'>): Buffer {
  if (layout.encoding === 'utf-8') {
    return Buffer.from(layout.bom ? '\uFEFF' + text : text, 'utf8');
  }
  return iconv.encode(text, layout.encoding, { addBOM: layout.bom });
}

/**
 * Splits decoded text into physical lines, keeping each line's own terminator.
 */
export function splitLines(text: string): { lines: string[]; terminators: string[]; eol: string } {
  const lines: string[] = [];
  const terminators: string[] = [];
  const lineEnd = /\r?\n/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = lineEnd.exec(text)) !== null) {
    lines.push(text.slice(start, m.index));
    terminators.push(m[0]);
    start = m.index + m[0].length;
  }
  if (start < text.length) {
    lines.push(text.slice(start));
    terminators.push('');
  }
  return { lines, terminators, eol: terminators[0] || '\n' };
}

/**
 * Joins lines back into file text. Line `i` takes the terminator of source line
 * `origins[i]` (itself when no origins are given). Only the last line may end
 * without one.
 */
export function joinLines(
  lines: string[],
  layout: Pick<TextLayout, 'terminators' | 'eol'>,
  origins?: readonly number[]
): string {
  let text = '';
  lines.forEach((line, i) => {
    const source = origins ? origins[i] : i;
    let terminator = source < layout.terminators.length ? layout.terminators[source] : layout.eol;
    if (terminator === '' && i < lines.length - 1) {
      terminator = layout.eol;
    }
    text += line + terminator;
  });
  return text;
}

/**
 * Loads a file as physical lines. The handle is closed on every path.
 */
export async function loadText(filePath: string): Promise<LoadedText> {
  const handle = await fs.open(filePath, 'r');
  let buffer: Buffer;
  try {
    buffer = await handle.readFile();
  } finally {
    await handle.close();
  }
  const { text, encoding, bom } = decodeText(buffer);
  const { lines, terminators, eol } = splitLines(text);
  return { lines, layout: { terminators, eol, encoding, bom } };
}

/**
 * Overwrites a file with the given lines, in the loaded layout. `origins` maps
 * each line to the source line whose terminator it keeps. The handle is closed
 * on every path, including a failed write.
 */
export async function writeText(
  filePath: string,
  lines: string[],
  layout: TextLayout,
  origins?: readonly number[]
): Promise<void> {
  const data = encodeText(joinLines(lines, layout, origins), layout);
  const handle = await fs.open(filePath, 'w');
  try {
    await handle.writeFile(data);
  } finally {
    await handle.close();
  }
}
