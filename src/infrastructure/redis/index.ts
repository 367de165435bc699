export { default as redisPlugin } from './redis-plugin.js';
export { publishTransition, TRANSITION_CHANNEL } from './transition-notifier.js';
export { startTransitionSubscriber, parseTransitionMessage } from './transition-subscriber.js';
export type { TransitionHandler } from './transition-subscriber.js';
