import { spawn } from 'node:child_process';

import { FormatterError } from './errors.js';

/**
 * Rewrites the text of one rendered file. Rejects with a
 * {@link FormatterError} when the file cannot be formatted.
 */
export type SqlFormatter = (file: string, contents: string) => Promise<string>;

/**
 * Formatter that pipes each file through an external command (for example
 * `pg_format`) over stdin and takes its stdout as the formatted text.
 *
 * @param command - Executable to run
 * @param args - Arguments passed on every run
 */
export function createCommandFormatter(command: string, args: readonly string[] = []): SqlFormatter {
  return (file, contents) =>
    new Promise((resolve, reject) => {
      const proc = spawn(command, [...args]);

      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', exitCode => {
        if (exitCode === 0) {
          resolve(stdout);
        } else {
          reject(new FormatterError(file, stderr || stdout));
        }
      });

      proc.on('error', error => {
        reject(new FormatterError(file, error.message));
      });

      proc.stdin.on('error', error => {
        reject(new FormatterError(file, error.message));
      });
      proc.stdin.end(contents);
    });
}
