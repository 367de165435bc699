export { default as agentRoutes, authenticateHub } from './agent-routes.js';
export type { AgentContext, AgentHostProbe, AgentInstances, CommandRunner, ResultReporter } from './agent-routes.js';
export { LogStreamServer } from './log-stream-server.js';
export type { LogSource } from './log-stream-server.js';
