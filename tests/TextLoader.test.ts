import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { decodeText, encodeText, joinLines, loadText, splitLines, writeText } from '../src/TextLoader';

describe('splitLines', () => {
  it('records CRLF endings and a final newline', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual({ lines: ['a', 'b'], terminators: ['\r\n', '\r\n'], eol: '\r\n' });
  });

  it('keeps each line ending of a mixed file', () => {
    expect(splitLines('a\nb\r\nc\n')).toEqual({ lines: ['a', 'b', 'c'], terminators: ['\n', '\r\n', '\n'], eol: '\n' });
  });

  it('handles a file without a final newline', () => {
    expect(splitLines('a\nb')).toEqual({ lines: ['a', 'b'], terminators: ['\n', ''], eol: '\n' });
  });

  it('returns no lines for empty text', () => {
    expect(splitLines('')).toEqual({ lines: [], terminators: [], eol: '\n' });
  });
});

describe('joinLines', () => {
  it('restores the recorded terminators', () => {
    expect(joinLines(['a', 'b'], { terminators: ['\n', ''], eol: '\n' })).toBe('a\nb');
    expect(joinLines(['a', 'b'], { terminators: ['\r\n', '\n'], eol: '\r\n' })).toBe('a\r\nb\n');
  });

  it('takes terminators from the mapped source lines', () => {
    const layout = { terminators: ['\r\n', '\n'], eol: '\r\n' };
    expect(joinLines(['x', 'a', 'b'], layout, [0, 0, 1])).toBe('x\r\na\r\nb\n');
  });

  it('only lets the last line go without a terminator', () => {
    expect(joinLines(['inc', 'a'], { terminators: [''], eol: '\n' }, [0, 0])).toBe('inc\na');
  });
});

describe('decodeText', () => {
  it('decodes UTF-8 and notes a byte order mark', () => {
    expect(decodeText(Buffer.from('\uFEFFx = 1', 'utf8'))).toEqual({ text: 'x = 1', encoding: 'utf-8', bom: true });
  });

  it('falls back to a sniffed encoding for invalid UTF-8', () => {
    const decoded = decodeText(Buffer.from([0x21, 0x20, 0x63, 0x61, 0x66, 0xe9]));
    expect(decoded.encoding).not.toBe('utf-8');
    expect(decoded.text.startsWith('! caf')).toBe(true);
    expect(decoded.bom).toBe(false);
  });

  it('only accepts an encoding that gives the same bytes back', () => {
    const bytes = Buffer.from('! it\x92s fine \x81\x8d\n', 'latin1');
    const decoded = decodeText(bytes);
    expect(encodeText(decoded.text, decoded).equals(bytes)).toBe(true);
  });
});

describe('encodeText', () => {
  it('writes the byte order mark back', () => {
    const bytes = encodeText('x', { encoding: 'utf-8', bom: true });
    expect([...bytes]).toEqual([0xef, 0xbb, 0xbf, 0x78]);
  });

  it('writes a UTF-16 byte order mark back', () => {
    const bytes = encodeText('x', { encoding: 'utf-16le', bom: true });
    expect([...bytes]).toEqual([0xff, 0xfe, 0x78, 0x00]);
  });
});

describe('loadText and writeText', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'accmacro-text-'));
  });
  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('round-trips a latin1 file byte for byte', async () => {
    const file = path.join(dir, 'legacy.f90');
    const text = [
      '! Cette routine calcule la température et la pression à chaque étape du modèle.',
      '! Les données sont copiées vers le périphérique avant la boucle principale.',
      '! Paramètres: période, fréquence, intensité.',
      'SUBROUTINE calcul_meteo',
      'END SUBROUTINE calcul_meteo',
      ''
    ].join('\n');
    const bytes = Buffer.from(text, 'latin1');
    await fs.writeFile(file, bytes);
    const loaded = await loadText(file);
    expect(loaded.layout.encoding).not.toBe('utf-8');
    expect(loaded.lines).toHaveLength(5);
    expect(loaded.lines[3]).toBe('SUBROUTINE calcul_meteo');
    await writeText(file, loaded.lines, loaded.layout);
    expect((await fs.readFile(file)).equals(bytes)).toBe(true);
  });

  it('rejects a missing file', async () => {
    await expect(loadText(path.join(dir, 'nope.f90'))).rejects.toThrow('ENOENT');
  });
});
