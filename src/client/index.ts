/**
 * Actor Client
 *
 * Call a served actor over HTTP or WebSocket.
 */

export { HttpActorClient, WebSocketActorClient } from './ActorClient.js';
export type { ActorClient, ClientConfig } from './ActorClient.js';
