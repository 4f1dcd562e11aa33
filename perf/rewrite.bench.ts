import { runRewrite } from '../src/main';
import { resolveConfig } from '../src/config';
import { generatePerfFiles } from './utils';
import * as os from 'os';

/**
 * Performance benchmark: rewrite speed over many generated Fortran files.
 * Needs `npm run build` first, since the worker pool loads dist/rewriteWorker.js.
 */
jest.setTimeout(60000);
test('performance benchmark for directive rewriting', async () => {
  const { tmpDir, files } = await generatePerfFiles({ prefix: 'rewrite-' });
  const parallelism = os.cpus().length * 2;
  const options = { config: resolveConfig(), mode: 'pragmas' as const, dryRun: true };
  // Warm-up: verify no errors
  const warm = await runRewrite(tmpDir, parallelism, false, options);
  if (warm !== 0) {
    console.error(`Rewrite setup failed with code ${warm}`);
    process.exit(warm);
  }
  const hrStart = process.hrtime();
  const cpuStart = process.cpuUsage();
  await runRewrite(tmpDir, parallelism, false, { ...options, dryRun: false });
  const hrDiff = process.hrtime(hrStart);
  const cpuDiff = process.cpuUsage(cpuStart);
  const elapsed = hrDiff[0] + hrDiff[1] / 1e9;
  const userMs = cpuDiff.user / 1000;
  const sysMs = cpuDiff.system / 1000;
  console.log(
    `Rewrote ${files.length} files in ${elapsed.toFixed(3)}s; ` +
    `CPU user ${userMs.toFixed(1)}ms sys ${sysMs.toFixed(1)}ms`
  );
});
