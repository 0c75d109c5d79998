/**
 * Frame Encoding and Extraction
 *
 * Implements the length-prefixed framing:
 * | total_len (4B) | payload (total_len - 4 bytes) |
 *
 * total_len counts itself. The payload is never interpreted here.
 */

import { LENGTH_FIELD_SIZE, MAX_FRAME_SIZE } from "./constants.js";
import type { Frame } from "./types.js";
import { ByteCursor } from "./cursor.js";
import { FrameTooLargeError, FrameTooSmallError } from "./errors.js";

/**
 * Encode a frame for transmission
 *
 * @param body - Everything that follows the length prefix
 */
export function encodeFrame(body: Buffer): Buffer {
  const buffer = Buffer.alloc(LENGTH_FIELD_SIZE + body.length);

  buffer.writeUInt32BE(LENGTH_FIELD_SIZE + body.length, 0);
  body.copy(buffer, LENGTH_FIELD_SIZE);

  return buffer;
}

/**
 * Extract a complete frame from the cursor
 *
 * Returns null when more data is needed; nothing is consumed in that case,
 * so the call can be retried after more bytes are appended.
 *
 * @throws FrameTooSmallError when total_len < 4
 * @throws FrameTooLargeError when total_len > maxFrameSize
 */
export function tryExtractFrame(
  cursor: ByteCursor,
  maxFrameSize: number = MAX_FRAME_SIZE
): Frame | null {
  // Need at least 4 bytes for length
  if (cursor.available < LENGTH_FIELD_SIZE) {
    return null;
  }

  const frameLength = cursor.peekUInt32BE(0);

  if (frameLength < LENGTH_FIELD_SIZE) {
    throw new FrameTooSmallError(frameLength);
  }

  if (frameLength > maxFrameSize) {
    throw new FrameTooLargeError(frameLength, maxFrameSize);
  }

  // Not enough data yet
  if (cursor.available < frameLength) {
    return null;
  }

  const bytes = cursor.take(frameLength);

  return {
    length: frameLength,
    payload: bytes.subarray(LENGTH_FIELD_SIZE),
    bytes,
  };
}
