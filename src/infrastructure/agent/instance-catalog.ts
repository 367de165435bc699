import { constants } from 'node:fs';
import { access, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { INSTANCE_PATTERN } from '../../application/command-dispatcher.js';

/**
 * The game-server scripts this agent may run: either the configured
 * list, or every executable file in the game root with a valid name.
 */
export class InstanceCatalog {
  constructor(
    private readonly gameRoot: string,
    private readonly configured: readonly string[] | null,
  ) {}

  async list(): Promise<string[]> {
    const candidates = this.configured ?? (await readdir(this.gameRoot));
    const found: string[] = [];
    for (const name of candidates) {
      if (await this.isRunnable(name)) found.push(name);
    }
    return found.sort();
  }

  async has(instance: string): Promise<boolean> {
    if (this.configured !== null && !this.configured.includes(instance)) return false;
    return this.isRunnable(instance);
  }

  scriptPath(instance: string): string {
    return join(this.gameRoot, instance);
  }

  consoleLogPath(instance: string): string {
    return join(this.gameRoot, 'log', 'console', `${instance}-console.log`);
  }

  private async isRunnable(name: string): Promise<boolean> {
    if (!INSTANCE_PATTERN.test(name)) return false;
    const path = this.scriptPath(name);
    try {
      const info = await stat(path);
      if (!info.isFile()) return false;
      await access(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
