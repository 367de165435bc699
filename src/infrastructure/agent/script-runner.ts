import { execFile } from 'node:child_process';

export interface ScriptOutcome {
  succeeded: boolean;
  exit_code: number | null;
  /** Last lines of combined output, or the failure reason. */
  detail: string;
}

const DETAIL_MAX_CHARS = 2000;

/** Keeps the tail of script output; the end carries the useful error. */
export function tailOutput(output: string, maxChars = DETAIL_MAX_CHARS): string {
  const trimmed = output.trim();
  return trimmed.length <= maxChars ? trimmed : `...${trimmed.slice(-maxChars)}`;
}

/**
 * Runs `./<instance> <action>` in the game root. The action is passed as
 * a single argv entry; no shell is involved.
 */
export function runScript(
  gameRoot: string,
  instance: string,
  action: string,
  timeoutMs: number,
): Promise<ScriptOutcome> {
  return new Promise((resolve) => {
    execFile(
      `./${instance}`,
      [action],
      { cwd: gameRoot, timeout: timeoutMs, maxBuffer: 4 * 1024 * 1024 },
      (err, stdout, stderr) => {
        const output = tailOutput(`${stdout}${stderr}`);
        if (err === null) {
          resolve({ succeeded: true, exit_code: 0, detail: output });
          return;
        }
        const exitCode = typeof err.code === 'number' ? err.code : null;
        const reason = err.killed ? `timed out after ${timeoutMs}ms` : err.message;
        resolve({ succeeded: false, exit_code: exitCode, detail: output || reason });
      },
    );
  });
}
