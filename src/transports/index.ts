/**
 * Transport Adapters
 *
 * Both adapters route through the same dispatcher and produce identical
 * replies for identical calls.
 */

export { Transport } from './Transport.js';
export { HttpTransport, CORS_ALLOW_HEADERS, CORS_ALLOW_METHODS, methodNameFromPath } from './HttpTransport.js';
export {
  WebSocketTransport,
  ENVELOPE_POLICIES,
  INVALID_ENVELOPE_MESSAGE,
  MISSING_METHOD
} from './WebSocketTransport.js';

export type { Listener, TransportKind } from './Transport.js';
export type { HttpTransportConfig } from './HttpTransport.js';
export type { EnvelopePolicy, WebSocketTransportConfig } from './WebSocketTransport.js';
