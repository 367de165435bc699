export { spokeBaseUrl, spokeWsUrl, DEFAULT_SPOKE_PORT } from './spoke-url.js';
export { HttpSpokeClient, API_KEY_HEADER } from './http-spoke-client.js';
export { WsLogUpstreamConnector } from './ws-log-connector.js';
