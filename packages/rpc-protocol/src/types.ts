/**
 * Message types for the msgpack-RPC protocol.
 *
 * Every message is a msgpack array whose first element is the type tag:
 * ┌──────────────┬──────────────────────────────┐
 * │ Request      │ [0, id, method, params]      │
 * │ Response     │ [1, id, error, result]       │
 * │ Notification │ [2, method, params]          │
 * └──────────────┴──────────────────────────────┘
 */

// ============================================================================
// Message Type Constants
// ============================================================================

export const MessageType = {
  REQUEST: 0,
  RESPONSE: 1,
  NOTIFICATION: 2,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/** Reverse lookup for message type names */
export const MessageTypeName: Record<number, string> = Object.fromEntries(
  Object.entries(MessageType).map(([k, v]) => [v, k])
);

// ============================================================================
// Messages
// ============================================================================

export interface RequestMessage {
  type: typeof MessageType.REQUEST;
  /** Correlation ID, unique among this sender's outstanding requests */
  id: number;
  method: string;
  params: unknown[];
}

export interface ResponseMessage {
  type: typeof MessageType.RESPONSE;
  id: number;
  /** Non-null means the request failed; takes precedence over result */
  error: unknown;
  result: unknown;
}

export interface NotificationMessage {
  type: typeof MessageType.NOTIFICATION;
  method: string;
  params: unknown[];
}

export type Message = RequestMessage | ResponseMessage | NotificationMessage;

/** Messages the dispatcher routes to handlers */
export type InboundCall = RequestMessage | NotificationMessage;

// ============================================================================
// Constructors
// ============================================================================

export function createRequest(
  id: number,
  method: string,
  params: unknown[]
): RequestMessage {
  return { type: MessageType.REQUEST, id, method, params };
}

export function createResponse(
  id: number,
  error: unknown,
  result: unknown
): ResponseMessage {
  return { type: MessageType.RESPONSE, id, error, result };
}

export function createNotification(
  method: string,
  params: unknown[]
): NotificationMessage {
  return { type: MessageType.NOTIFICATION, method, params };
}

/**
 * Get the message type name for debugging.
 */
export function getMessageTypeName(type: number): string {
  return MessageTypeName[type] ?? `Unknown(${type})`;
}
