export { HttpTransport, WELL_KNOWN_PATH, VERSION_HEADER, EXTENSIONS_HEADER, LAST_EVENT_ID_HEADER } from './HttpTransport.js';
export type { HttpTransportConfig, Authenticator } from './HttpTransport.js';

export { WebSocketTransport, sendPaced } from './WebSocketTransport.js';
export type { WebSocketTransportConfig, PacedSocket } from './WebSocketTransport.js';
