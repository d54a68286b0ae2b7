/**
 * Error classes for actorwire
 *
 * Application-level errors (malformed envelope, unknown method, parameter
 * decoding, result encoding, invocation) are caught by the dispatcher and
 * rendered as JSON-string replies. Transport, handshake and startup errors
 * are raised by the adapters and the server lifecycle.
 */

/**
 * Base error class for all actorwire errors
 */
export class ActorWireError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ActorWireError';

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ActorWireError);
    }
  }

  /**
   * Serialize error for logs and diagnostics
   *
   * @param includeStack - Include stack trace (development mode only)
   */
  toJSON(includeStack = false): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      ...(includeStack && { stack: this.stack })
    };
  }
}

/**
 * Request body or frame is not valid JSON
 */
export class MalformedEnvelopeError extends ActorWireError {
  constructor(reason: string) {
    super(`Failed to parse JSON: ${reason}`, 'MALFORMED_ENVELOPE', { reason });
    this.name = 'MalformedEnvelopeError';
  }
}

/**
 * Method name is not in the actor's registry
 */
export class UnknownMethodError extends ActorWireError {
  constructor(method: string) {
    super(`Unknown method: ${method}`, 'UNKNOWN_METHOD', { method });
    this.name = 'UnknownMethodError';
  }
}

/**
 * Parameters do not match the method's declared shape
 */
export class ParamDeserializationError extends ActorWireError {
  constructor(method: string, reason: string) {
    super(
      `Failed to deserialize parameters for ${method}: ${reason}`,
      'PARAM_DESERIALIZATION',
      { method, reason }
    );
    this.name = 'ParamDeserializationError';
  }
}

/**
 * Method result cannot be encoded as JSON
 */
export class ResultSerializationError extends ActorWireError {
  constructor(method: string, reason: string) {
    super(
      `Failed to serialize result for ${method}: ${reason}`,
      'RESULT_SERIALIZATION',
      { method, reason }
    );
    this.name = 'ResultSerializationError';
  }
}

/**
 * Method threw while running against the actor
 */
export class InvocationError extends ActorWireError {
  constructor(method: string, originalError: unknown) {
    const originalMessage = originalError instanceof Error ? originalError.message : String(originalError);
    super(`Method ${method} failed: ${originalMessage}`, 'INVOCATION_FAILED', {
      method,
      originalMessage,
      originalName: originalError instanceof Error ? originalError.name : undefined
    });
    this.name = 'InvocationError';

    // Preserve original stack if available
    if (originalError instanceof Error && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Request body or frame could not be read
 */
export class TransportReadError extends ActorWireError {
  constructor(message: string, public status = 400, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_READ', details);
    this.name = 'TransportReadError';
  }
}

/**
 * TLS negotiation with a client failed
 */
export class HandshakeError extends ActorWireError {
  constructor(reason: string, remoteAddress?: string) {
    super(`TLS handshake error: ${reason}`, 'TLS_HANDSHAKE', { reason, remoteAddress });
    this.name = 'HandshakeError';
  }
}

/**
 * Listener could not be started
 */
export class ListenerBindError extends ActorWireError {
  constructor(message: string, code = 'LISTENER_BIND', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ListenerBindError';
  }
}

/**
 * Certificate or private key material is unusable
 */
export class TlsIdentityError extends ListenerBindError {
  constructor(message: string, path?: string) {
    super(message, 'TLS_IDENTITY', { path });
    this.name = 'TlsIdentityError';
  }
}

/**
 * Two exposed methods share a name
 */
export class DuplicateMethodError extends ActorWireError {
  constructor(actor: string, method: string) {
    super(`Method collision: ${actor}.${method} is already registered`, 'DUPLICATE_METHOD', {
      actor,
      method
    });
    this.name = 'DuplicateMethodError';
  }
}

/**
 * Exposed method name is not an identifier
 */
export class InvalidMethodNameError extends ActorWireError {
  constructor(actor: string, method: string) {
    super(
      `Invalid method name: ${JSON.stringify(method)} on ${actor}. Must match pattern: [A-Za-z_][A-Za-z0-9_]*`,
      'INVALID_METHOD_NAME',
      { actor, method }
    );
    this.name = 'InvalidMethodNameError';
  }
}

/**
 * Actor handle was used after being handed to a server
 */
export class ActorConsumedError extends ActorWireError {
  constructor(actor: string) {
    super(`Actor ${actor} has been handed to a server and can no longer be called directly`, 'ACTOR_CONSUMED', {
      actor
    });
    this.name = 'ActorConsumedError';
  }
}

/**
 * Configuration file or environment is invalid
 */
export class ConfigError extends ActorWireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
    this.name = 'ConfigError';
  }
}

/**
 * Client-side failure talking to a server
 */
export class TransportError extends ActorWireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
    this.name = 'TransportError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
