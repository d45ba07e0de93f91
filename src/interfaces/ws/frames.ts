/**
 * RFC 6455 frame codec (server side).
 *
 * Client → server frames are always masked (§5.3); server → client
 * frames are sent unmasked.
 */

export const OPCODE_CONTINUATION = 0x00;
export const OPCODE_TEXT = 0x01;
export const OPCODE_BINARY = 0x02;
export const OPCODE_CLOSE = 0x08;
export const OPCODE_PING = 0x09;
export const OPCODE_PONG = 0x0a;

export interface ParsedFrame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  /** Offset of the first byte after this frame. */
  nextOffset: number;
}

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

/**
 * Parse ONE WebSocket frame from the front of `buf`.
 * Returns null when more bytes are needed.
 *
 * @throws FrameError on malformed data or a payload above `maxPayload`.
 */
export function tryParseFrame(buf: Buffer, maxPayload: number): ParsedFrame | null {
  if (buf.length < 2) return null;

  const b0 = buf.readUInt8(0);
  const b1 = buf.readUInt8(1);

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const wide = buf.readBigUInt64BE(offset);
    if (wide > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FrameError('Frame length exceeds 2^53 - 1');
    }
    payloadLen = Number(wide);
    offset += 8;
  }

  if (payloadLen > maxPayload) {
    throw new FrameError(`Frame payload of ${payloadLen} bytes exceeds limit of ${maxPayload}`);
  }

  const maskLen = masked ? 4 : 0;
  const totalNeeded = offset + maskLen + payloadLen;
  if (buf.length < totalNeeded) return null;

  let payload = buf.subarray(offset + maskLen, totalNeeded);

  if (masked) {
    const maskingKey = buf.subarray(offset, offset + 4);
    const unmasked = Buffer.allocUnsafe(payload.length);
    for (let i = 0; i < payload.length; i++) {
      unmasked.writeUInt8(payload.readUInt8(i) ^ maskingKey.readUInt8(i % 4), i);
    }
    payload = unmasked;
  }

  return { fin, opcode, payload, nextOffset: totalNeeded };
}

function frameHeader(opcode: number, length: number): Buffer {
  const first = 0x80 | opcode; // FIN + opcode

  if (length < 126) {
    return Buffer.from([first, length]);
  }
  if (length <= 0xffff) {
    const header = Buffer.alloc(4);
    header.writeUInt8(first, 0);
    header.writeUInt8(126, 1);
    header.writeUInt16BE(length, 2);
    return header;
  }
  const header = Buffer.alloc(10);
  header.writeUInt8(first, 0);
  header.writeUInt8(127, 1);
  header.writeBigUInt64BE(BigInt(length), 2);
  return header;
}

export function encodeTextFrame(data: string): Buffer {
  const payload = Buffer.from(data, 'utf-8');
  return Buffer.concat([frameHeader(OPCODE_TEXT, payload.length), payload]);
}

/** RFC 6455 §5.5: control frames carry at most 125 bytes; longer payloads are dropped. */
export function encodeControlFrame(opcode: number, payload: Buffer = Buffer.alloc(0)): Buffer {
  if (payload.length > 125) {
    return frameHeader(opcode, 0);
  }
  return Buffer.concat([frameHeader(opcode, payload.length), payload]);
}

/** Close frame with a status code (e.g. 1000 normal, 1008 policy, 1011 server error). */
export function encodeCloseFrame(code: number, reason = ''): Buffer {
  const text = Buffer.from(reason, 'utf-8').subarray(0, 123);
  const payload = Buffer.alloc(2 + text.length);
  payload.writeUInt16BE(code, 0);
  text.copy(payload, 2);
  return encodeControlFrame(OPCODE_CLOSE, payload);
}
