// Utility to generate a temp directory with many Fortran files containing OpenACC directives
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

// One directive of each family, some continued over two lines
const directives: string[][] = [
  ['  !$ACC DATA PRESENT(ZA, ZB) COPYIN(ZC) IF(LACC)'],
  ['  !$ACC ENTER DATA CREATE(ZA, ZB) &', '  !$ACC ASYNC(IQ) IF(LACC)'],
  ['  !$ACC UPDATE HOST(ZA) WAIT(IQ) IF(LACC)'],
  ['  !$ACC DATA HOST(ZB)'],
  ['  !$ACC PARALLEL LOOP GANG']
];

/**
 * Generates a temporary directory filled with .f90 files, each holding a
 * subroutine with a run of OpenACC directives between filler statements.
 * @param options.prefix Prefix for mkdtemp (defaults to 'perf-').
 * @param options.totalFiles Number of files to create (defaults to 2000).
 * @returns Object with tmpDir and array of file paths created.
 */
export async function generatePerfFiles(
  options?: { prefix?: string; totalFiles?: number }
): Promise<{ tmpDir: string; files: string[] }> {
  const prefix = options?.prefix ?? 'perf-';
  const totalFiles = options?.totalFiles ?? 2000;
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const files: string[] = [];
  for (let i = 0; i < totalFiles; i++) {
    const filename = path.join(tmpDir, `kernel${i}.f90`);
    const lines: string[] = ['! generated kernel', `SUBROUTINE KERNEL${i}(ZA, ZB, ZC, LACC, IQ)`];
    for (let j = 0; j < 20; j++) {
      lines.push(...directives[(i + j) % directives.length]);
      lines.push(`  ZA(${j + 1}) = ZB(${j + 1}) * ZC(${j + 1})`);
    }
    lines.push(`END SUBROUTINE KERNEL${i}`, '');
    await fs.writeFile(filename, lines.join('\n'), 'utf-8');
    files.push(filename);
  }
  return { tmpDir, files };
}
