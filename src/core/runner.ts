import { spawn } from 'node:child_process';
import { ExternalProcessError, ToolNotFoundError } from './errors.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Every external build process goes through a runner. A run resolves with the
 * combined stdout/stderr once the process exits 0 and rejects otherwise.
 */
export interface ProcessRunner {
  run(command: string[], opts?: RunOptions): Promise<string>;
}

export function createProcessRunner(onOutput?: (chunk: string) => void): ProcessRunner {
  return {
    run(command, opts = {}) {
      const [file, ...args] = command;
      if (!file) {
        return Promise.reject(new Error('Empty command'));
      }

      return new Promise((resolve, reject) => {
        const child = spawn(file, args, {
          cwd: opts.cwd,
          env: opts.env ?? process.env,
          stdio: ['ignore', 'pipe', 'pipe'],
        });

        let output = '';
        const collect = (data: Buffer) => {
          const text = data.toString();
          output += text;
          onOutput?.(text);
        };
        child.stdout.on('data', collect);
        child.stderr.on('data', collect);

        child.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code === 'ENOENT') {
            reject(new ToolNotFoundError(`Executable not found: ${file}`));
          } else {
            reject(err);
          }
        });
        child.on('close', (code) => {
          const exitCode = code ?? 1;
          if (exitCode === 0) {
            resolve(output);
          } else {
            reject(new ExternalProcessError(command, exitCode, output));
          }
        });
      });
    },
  };
}
