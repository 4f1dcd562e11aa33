import { FileOutcome } from './PragmaPrimitives';
import { rewriteFile, WorkerTask } from './RewriteEngine';

/**
 * Worker task: rewrite one file.
 * @param task File path and rewrite options.
 * @returns What happened to the file.
 */
export default async function rewriteWorker(task: WorkerTask): Promise<FileOutcome> {
  return await rewriteFile(task.filePath, task.options);
}
