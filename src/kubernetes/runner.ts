import { execFile } from 'node:child_process';
import { debug } from '../debug.js';
import { MissingDependencyError } from '../errors.js';

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external command to completion. Resolves for any exit status; rejects only when the
 * command could not be run at all.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandOutput>;

// Cluster-wide pod listings of large clusters run to hundreds of megabytes.
const MAX_BUFFER_BYTES = 512 * 1024 * 1024;

export const execFileRunner: CommandRunner = (file, args) =>
  new Promise((resolveRun, rejectRun) => {
    const startedAt = Date.now();
    debug('command start', { file, args });
    execFile(file, args, { encoding: 'utf8', maxBuffer: MAX_BUFFER_BYTES }, (error, stdout, stderr) => {
      const elapsedMs = Date.now() - startedAt;
      if (!error) {
        debug('command end', { file, exitCode: 0, elapsedMs, stdoutBytes: stdout.length });
        resolveRun({ exitCode: 0, stdout, stderr });
        return;
      }

      const code: unknown = error.code;
      if (typeof code === 'number') {
        debug('command end', { file, exitCode: code, elapsedMs, stderrPreview: stderr.slice(0, 500) });
        resolveRun({ exitCode: code, stdout, stderr });
        return;
      }

      debug('command failed to run', { file, code, signal: error.signal, elapsedMs });
      if (code === 'ENOENT' || code === 'EACCES') {
        rejectRun(
          new MissingDependencyError(
            `${file} command could not be found. Please ensure it's installed and in your PATH.`,
            { cause: error },
          ),
        );
        return;
      }
      rejectRun(new Error(`${file} ${args.join(' ')} failed: ${error.message}`, { cause: error }));
    });
  });
