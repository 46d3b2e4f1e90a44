import type { RawData } from 'ws';
import { MessageValidator } from './MessageValidator';
import { PROTOCOL } from '../types/MessageTypes';
import { PeerMessage } from '../types/Interfaces';
import { MalformedMessageError } from '../../shared/errors';

// Longest excerpt of a bad frame kept on the error for diagnostics
const RAW_EXCERPT_LENGTH = 200;

/**
 * JSON wire codec. One WebSocket text frame carries exactly one JSON object,
 * so frame boundaries are message boundaries.
 */
export class JsonProtocol {
  // Serialize message to a text frame
  static serialize(message: PeerMessage): string {
    return JSON.stringify(message);
  }

  // Decode and validate a frame; throws MalformedMessageError
  static deserialize(data: RawData | string, maxPayloadSize: number = PROTOCOL.MAX_PAYLOAD_SIZE): PeerMessage {
    const text = this.toText(data);

    if (Buffer.byteLength(text, 'utf8') > maxPayloadSize) {
      throw new MalformedMessageError(`Message exceeds maximum size of ${maxPayloadSize} bytes`, text.slice(0, RAW_EXCERPT_LENGTH));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new MalformedMessageError(
        `Failed to parse message: ${error instanceof Error ? error.message : String(error)}`,
        text.slice(0, RAW_EXCERPT_LENGTH),
      );
    }

    const validation = MessageValidator.validate(parsed);
    if (!validation.valid) {
      throw new MalformedMessageError(validation.error, text.slice(0, RAW_EXCERPT_LENGTH));
    }

    return validation.message;
  }

  private static toText(data: RawData | string): string {
    if (typeof data === 'string') return data;
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
  }
}
