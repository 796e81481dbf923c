import type { RawData } from 'ws';
import { frameToString, parseMessage, serializeMessage, type Message } from '@pagesync/sdk';

/**
 * Server side of the wire protocol
 *
 * Frames are UTF-8 JSON text. Message shapes and validation live in the
 * SDK codec; this module adapts them to ws frames.
 */

export { frameToString };

export function createMessageId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Decode an incoming frame. Malformed frames are logged and dropped.
 */
export function decodeFrame(data: RawData | string): Message | null {
  return parseMessage(typeof data === 'string' ? data : frameToString(data));
}

export function encodeMessage(message: Message): string {
  return serializeMessage(message);
}
