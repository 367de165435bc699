import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Logger } from 'pino';

export type LineHandler = (instance: string, line: string) => void;

export interface TailHandle {
  stop(): void;
}

/**
 * Follows the console logs of several instances with `tail -F`, which
 * keeps following across log rotation and waits for files that do not
 * exist yet. Each instance starts with its last `replayLines` lines.
 */
export function tailConsoleLogs(
  files: ReadonlyArray<{ instance: string; path: string }>,
  replayLines: number,
  onLine: LineHandler,
  log: Logger,
): TailHandle {
  const children: ChildProcess[] = [];

  for (const { instance, path } of files) {
    const child = spawn('tail', ['-n', String(replayLines), '-F', path], {
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    children.push(child);

    child.on('error', (err) => {
      log.warn({ err, instance }, 'Failed to start log tail');
    });

    if (child.stdout !== null) {
      const rl = createInterface({ input: child.stdout });
      rl.on('line', (line) => onLine(instance, line));
    }
  }

  return {
    stop: () => {
      for (const child of children) {
        if (child.exitCode === null) child.kill('SIGTERM');
      }
    },
  };
}
