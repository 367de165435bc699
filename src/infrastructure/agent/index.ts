export { InstanceCatalog } from './instance-catalog.js';
export { SystemProbe, parseSessionList } from './system-probe.js';
export { runScript, tailOutput } from './script-runner.js';
export type { ScriptOutcome } from './script-runner.js';
export { HubReporter } from './hub-reporter.js';
export { tailConsoleLogs } from './log-tailer.js';
export type { TailHandle, LineHandler } from './log-tailer.js';
