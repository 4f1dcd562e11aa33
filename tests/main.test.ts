import { configFromCli, parseCliArgs, runRewrite } from '../src/main';
import { resolveConfig } from '../src/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

describe('parseCliArgs', () => {
  it('defaults with no args', () => {
    expect(parseCliArgs([])).toEqual({
      showHelp: false,
      verbose: false,
      dryRun: false,
      parallelism: -1,
      extensions: [],
      mode: 'pragmas',
      includeLine: undefined,
      strictParens: false,
      target: './src'
    });
  });
  it('parses help flag', () => {
    expect(parseCliArgs(['--help']).showHelp).toBe(true);
  });
  it('parses every option', () => {
    const opts = parseCliArgs([
      '-v', '-n', '-p', '0', '-e', 'F', '--ext=.f', '-m', 'alloc-calls',
      '--include', '#include "macros.h"', '--strict-parens', 'src/dyn'
    ]);
    expect(opts).toEqual({
      showHelp: false,
      verbose: true,
      dryRun: true,
      parallelism: 0,
      extensions: ['F', '.f'],
      mode: 'alloc-calls',
      includeLine: '#include "macros.h"',
      strictParens: true,
      target: 'src/dyn'
    });
  });
  it('parses parallelism with equals', () => {
    expect(parseCliArgs(['--parallelism=7']).parallelism).toBe(7);
  });
  it('rejects invalid parallelism value', () => {
    expect(parseCliArgs(['-p', 'x']).error).toMatch(/Invalid parallelism value: x/);
  });
  it('rejects an unknown mode', () => {
    expect(parseCliArgs(['--mode', 'bogus']).error).toMatch(/Invalid mode: bogus/);
  });
  it('rejects missing values', () => {
    expect(parseCliArgs(['--mode']).error).toBe('Missing value for --mode');
    expect(parseCliArgs(['-e']).error).toBe('Missing value for --ext');
  });
  it('rejects too many args', () => {
    expect(parseCliArgs(['a', 'b']).error).toBe('Too many arguments');
  });
});

describe('configFromCli', () => {
  it('maps options onto the configuration', () => {
    const config = configFromCli({ ...parseCliArgs(['-e', 'F', '-e', '.f', '--strict-parens']) });
    expect(config.extensions).toEqual(['.f', '.f']);
    expect(config.adjacentParenFamilies).toEqual(['DataPresent', 'EnterDataCreate', 'HostTransfer']);
    expect(config.includeLine).toBe("include 'macros.h'");
  });
  it('keeps the defaults when no overrides are given', () => {
    expect(configFromCli(parseCliArgs([]))).toEqual(resolveConfig());
  });
});

describe('runRewrite', () => {
  let dir: string;
  let stderrSpy: jest.SpyInstance;
  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'accmacro-run-'));
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });
  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('rewrites every matching file in-process and returns 0', async () => {
    const file = path.join(dir, 'copy.F90');
    await fs.writeFile(file, [
      '! copy kernel',
      '  !$acc update host(a, b) &',
      '  !$acc async(q) if(l)'
    ].join('\n') + '\n', 'utf-8');
    const code = await runRewrite(dir, 0, true, { config: resolveConfig(), mode: 'pragmas', dryRun: false });
    expect(code).toBe(0);
    expect(stderrSpy).toHaveBeenCalledWith('Parallelism: 0\n');
    expect(console.log).toHaveBeenCalledWith(`Updated: ${file}`);
    expect(await fs.readFile(file, 'utf-8')).toBe(
      "! copy kernel\ninclude 'macros.h'\n  GPU_DATA_UPDATE_HOST_ASYNC_IF(l, q, a, b)\n"
    );
  });

  it('runs the temp declaration pass when asked', async () => {
    const file = path.join(dir, 'decl.f90');
    await fs.writeFile(file, 'temp(REAL(KIND=JPRB), Z, (N))\n', 'utf-8');
    const code = await runRewrite(dir, 0, false, { config: resolveConfig(), mode: 'temp-decls', dryRun: false });
    expect(code).toBe(0);
    expect(await fs.readFile(file, 'utf-8')).toBe('REAL (KIND=JPRB), pointer :: Z(:)\n');
  });

  it('returns 0 when no files match', async () => {
    await fs.writeFile(path.join(dir, 'readme.md'), '!$ACC DATA PRESENT(A)\n', 'utf-8');
    const code = await runRewrite(dir, 0, false, { config: resolveConfig(), mode: 'pragmas', dryRun: false });
    expect(code).toBe(0);
    expect(await fs.readFile(path.join(dir, 'readme.md'), 'utf-8')).toBe('!$ACC DATA PRESENT(A)\n');
  });

  it('throws for a missing path', async () => {
    await expect(
      runRewrite(path.join(dir, 'absent'), 0, false, { config: resolveConfig(), mode: 'pragmas', dryRun: false })
    ).rejects.toThrow('Path not found');
  });
});
