import { execFile } from 'node:child_process';
import { statfs } from 'node:fs/promises';
import { cpus, freemem, totalmem } from 'node:os';
import { promisify } from 'node:util';
import type { SpokeMetrics } from '../../domain/index.js';

const execFileAsync = promisify(execFile);

interface CpuSnapshot {
  idle: number;
  total: number;
}

function snapshotCpu(): CpuSnapshot {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.idle + t.irq;
  }
  return { idle, total };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Host telemetry for `/status`.
 *
 * CPU usage is measured between consecutive calls (the first call
 * measures since boot), so polling never blocks on a sampling window.
 */
export class SystemProbe {
  private lastCpu: CpuSnapshot = { idle: 0, total: 0 };

  constructor(private readonly diskPath: string) {}

  async metrics(): Promise<SpokeMetrics> {
    const cpu = snapshotCpu();
    const idleDelta = cpu.idle - this.lastCpu.idle;
    const totalDelta = cpu.total - this.lastCpu.total;
    this.lastCpu = cpu;

    const fs = await statfs(this.diskPath);
    const diskUsed = fs.blocks === 0 ? 0 : 1 - fs.bavail / fs.blocks;

    return {
      cpu_percent: totalDelta <= 0 ? 0 : round1((1 - idleDelta / totalDelta) * 100),
      ram_percent: round1((1 - freemem() / totalmem()) * 100),
      disk_percent: round1(diskUsed * 100),
    };
  }

  /** tmux session names; empty when no tmux server is running. */
  async sessions(): Promise<string[]> {
    try {
      const { stdout } = await execFileAsync('tmux', ['ls', '-F', '#{session_name}'], { timeout: 3_000 });
      return parseSessionList(stdout);
    } catch {
      // tmux exits non-zero when there is no server
      return [];
    }
  }
}

export function parseSessionList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
