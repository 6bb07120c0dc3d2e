// Message envelope: size(3, LE, header included) | type(1) | dejavu(4, LE)

import { FieldOverflow, MalformedMessage } from "../errors";
import { HEADER_SIZE, MAX_MESSAGE_SIZE, type MessageType } from "../core/constants";
import type { MessageHeader, WireMessage } from "../core/types";

export const encodeHeader = (header: MessageHeader): Buffer => {
  const { size, type, dejavu } = header;
  if (!Number.isInteger(size) || size < HEADER_SIZE || size > MAX_MESSAGE_SIZE) {
    throw new FieldOverflow("header.size", `${size} is outside [${HEADER_SIZE}, ${MAX_MESSAGE_SIZE}]`);
  }
  if (!Number.isInteger(type) || type < 0 || type > 0xff) {
    throw new FieldOverflow("header.type", `${type} is outside [0, 255]`);
  }
  if (!Number.isInteger(dejavu) || dejavu < 0 || dejavu > 0xffffffff) {
    throw new FieldOverflow("header.dejavu", `${dejavu} is outside [0, 4294967295]`);
  }
  const out = Buffer.alloc(HEADER_SIZE);
  out.writeUIntLE(size, 0, 3);
  out.writeUInt8(type, 3);
  out.writeUInt32LE(dejavu, 4);
  return out;
};

/** Declared total size; the framer needs only the first three bytes. */
export const readMessageSize = (bytes: Uint8Array): number => {
  if (bytes.length < 3) {
    throw new MalformedMessage(`header: needs 3 bytes for size, got ${bytes.length}`);
  }
  return bytes[0] | (bytes[1] << 8) | (bytes[2] << 16);
};

export const decodeHeader = (bytes: Uint8Array): MessageHeader => {
  if (bytes.length < HEADER_SIZE) {
    throw new MalformedMessage(`header: needs ${HEADER_SIZE} bytes, got ${bytes.length}`);
  }
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  const size = buf.readUIntLE(0, 3);
  if (size < HEADER_SIZE) {
    throw new MalformedMessage(`header: declared size ${size} is below ${HEADER_SIZE}`);
  }
  return { size, type: buf.readUInt8(3), dejavu: buf.readUInt32LE(4) };
};

export const encodeMessage = (
  type: MessageType,
  dejavu: number,
  body: Uint8Array = new Uint8Array(0),
): Buffer => {
  const header = encodeHeader({ size: HEADER_SIZE + body.length, type, dejavu });
  return Buffer.concat([header, body]);
};

/** One complete frame; `size` must cover the buffer exactly. */
export const decodeMessage = (raw: Uint8Array): WireMessage => {
  const header = decodeHeader(raw);
  if (header.size !== raw.length) {
    throw new MalformedMessage(
      `header: declared size ${header.size} disagrees with ${raw.length} bytes received`,
    );
  }
  const body = Buffer.from(raw.subarray(HEADER_SIZE));
  return { header, body };
};
