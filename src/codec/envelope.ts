/**
 * @module codec/envelope
 * @description Envelope Codec — binary framing of every channel message.
 *
 * Layout (big-endian):
 * - version: 1 byte (0x01)
 * - msg_type: 1 byte
 * - instance_id: 32 bytes
 * - message_id: 12 bytes
 * - publisher: 32 bytes (Ed25519 public key)
 * - seq: 4 bytes
 * - branch_id: 12 bytes
 * - prev_count: 1 byte, then prev_count × 12-byte message ids
 * - public_len: 4 bytes, then public payload
 * - nonce: 12 bytes
 * - masked_len: 4 bytes, then masked payload (AEAD ciphertext + tag)
 * - signature: 64 bytes, on every type except TAGGED_PACKET
 * - wrap_count: 2 bytes, then wrap blocks, on KEYLOAD only
 *
 * Wrap blocks:
 * - 0x01 public key: recipient 32 | ephemeral 32 | nonce 12 | wrapped 48
 * - 0x02 psk:        psk_id 16 | nonce 12 | wrapped 48
 *
 * Everything up to the nonce is the AEAD associated data. The signature
 * covers every other byte of the encoding.
 */

import { ChannelError } from "../interfaces/channel.js";
import type { MessageId } from "../types/branded.js";
import type {
  Envelope,
  KeyWrapBlock,
  MsgType,
} from "../types/message.js";
import {
  INSTANCE_ID_LENGTH,
  MESSAGE_ID_LENGTH,
  instanceIdBytes,
  instanceIdFromBytes,
  messageIdBytes,
  messageIdFromBytes,
} from "./address.js";
import {
  KEY_LENGTH,
  PSK_ID_LENGTH,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  asExchangeKey,
  asPublicKey,
  asSignature,
  fromHex,
  pskIdOf,
} from "../backends/crypto-utils.js";

// ─── Constants ─────────────────────────────────────────────────────

export const ENVELOPE_VERSION = 0x01;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const WRAPPED_KEY_LENGTH = KEY_LENGTH + TAG_LENGTH;
export const MAX_PREVIOUS = 0xff;
export const MAX_WRAPS = 0xffff;

export const WRAP_KIND_PUBLIC_KEY = 0x01;
export const WRAP_KIND_PSK = 0x02;

const MSG_TYPE_CODES: Record<MsgType, number> = {
  ANNOUNCE: 0,
  KEYLOAD: 1,
  SIGNED_PACKET: 2,
  TAGGED_PACKET: 3,
  SUBSCRIBE: 4,
  UNSUBSCRIBE: 5,
  SEQUENCE: 6,
};

export function encodeMsgType(type: MsgType): number {
  return MSG_TYPE_CODES[type];
}

/**
 * @throws {ChannelError} code=UNKNOWN_MSG_TYPE
 */
export function decodeMsgType(code: number): MsgType {
  switch (code) {
    case 0:
      return "ANNOUNCE";
    case 1:
      return "KEYLOAD";
    case 2:
      return "SIGNED_PACKET";
    case 3:
      return "TAGGED_PACKET";
    case 4:
      return "SUBSCRIBE";
    case 5:
      return "UNSUBSCRIBE";
    case 6:
      return "SEQUENCE";
    default:
      throw new ChannelError(`Unknown message type 0x${code.toString(16)}`, "UNKNOWN_MSG_TYPE");
  }
}

export function isSignedType(type: MsgType): boolean {
  return type !== "TAGGED_PACKET";
}

/** Fields that precede the ciphertext. */
export type EnvelopeHeader = Omit<Envelope, "nonce" | "maskedPayload" | "signature" | "keyWraps">;

// ─── Writer / Reader ───────────────────────────────────────────────

class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  u8(value: number): void {
    this.bytes(Uint8Array.of(value & 0xff));
  }

  u16(value: number): void {
    const out = new Uint8Array(2);
    new DataView(out.buffer).setUint16(0, value, false);
    this.bytes(out);
  }

  u32(value: number): void {
    const out = new Uint8Array(4);
    new DataView(out.buffer).setUint32(0, value >>> 0, false);
    this.bytes(out);
  }

  bytes(data: Uint8Array): void {
    this.chunks.push(data);
    this.length += data.length;
  }

  fixed(data: Uint8Array, length: number, what: string): void {
    if (data.length !== length) {
      throw new RangeError(`${what} must be ${length} bytes, got ${data.length}`);
    }
    this.bytes(data);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  u8(): number {
    this.need(1);
    return this.view.getUint8(this.offset++);
  }

  u16(): number {
    this.need(2);
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.need(4);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  bytes(length: number): Uint8Array {
    this.need(length);
    const out = this.buffer.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  private need(length: number): void {
    if (this.remaining < length) {
      throw new ChannelError(
        `Envelope truncated: needed ${length} bytes at offset ${this.offset}, ${this.remaining} left`,
        "TRUNCATED_ENVELOPE"
      );
    }
  }
}

// ─── Encode ────────────────────────────────────────────────────────

function writeHeader(writer: ByteWriter, header: EnvelopeHeader): void {
  if (header.previous.length > MAX_PREVIOUS) {
    throw new RangeError(`At most ${MAX_PREVIOUS} previous links, got ${header.previous.length}`);
  }
  writer.u8(ENVELOPE_VERSION);
  writer.u8(encodeMsgType(header.msgType));
  writer.bytes(instanceIdBytes(header.instanceId));
  writer.bytes(messageIdBytes(header.messageId));
  writer.fixed(header.publisher, PUBLIC_KEY_LENGTH, "Publisher");
  writer.u32(header.seq);
  writer.bytes(messageIdBytes(header.branchId));
  writer.u8(header.previous.length);
  for (const prev of header.previous) {
    writer.bytes(messageIdBytes(prev));
  }
  writer.u32(header.publicPayload.length);
  writer.bytes(header.publicPayload);
}

function writeBody(writer: ByteWriter, envelope: Omit<Envelope, "signature" | "keyWraps">): void {
  writer.fixed(envelope.nonce, NONCE_LENGTH, "Nonce");
  writer.u32(envelope.maskedPayload.length);
  writer.bytes(envelope.maskedPayload);
}

function writeKeyWraps(writer: ByteWriter, wraps: readonly KeyWrapBlock[]): void {
  if (wraps.length > MAX_WRAPS) {
    throw new RangeError(`At most ${MAX_WRAPS} key wraps, got ${wraps.length}`);
  }
  writer.u16(wraps.length);
  for (const wrap of wraps) {
    if (wrap.kind === "PUBLIC_KEY") {
      writer.u8(WRAP_KIND_PUBLIC_KEY);
      writer.fixed(wrap.recipient, PUBLIC_KEY_LENGTH, "Recipient");
      writer.fixed(wrap.ephemeral, PUBLIC_KEY_LENGTH, "Ephemeral key");
    } else {
      writer.u8(WRAP_KIND_PSK);
      const id = fromHex(wrap.pskId, PSK_ID_LENGTH);
      if (!id) {
        throw new RangeError(`Invalid PSK id ${wrap.pskId}`);
      }
      writer.bytes(id);
    }
    writer.fixed(wrap.nonce, NONCE_LENGTH, "Wrap nonce");
    writer.fixed(wrap.wrapped, WRAPPED_KEY_LENGTH, "Wrapped key");
  }
}

/**
 * Bytes bound into the AEAD: every field before the nonce.
 */
export function headerBytes(header: EnvelopeHeader): Uint8Array {
  const writer = new ByteWriter();
  writeHeader(writer, header);
  return writer.finish();
}

/**
 * Bytes the signature is computed over: the full encoding minus the
 * signature itself.
 */
export function signingBytes(envelope: Omit<Envelope, "signature">): Uint8Array {
  const writer = new ByteWriter();
  writeHeader(writer, envelope);
  writeBody(writer, envelope);
  if (envelope.msgType === "KEYLOAD") {
    writeKeyWraps(writer, envelope.keyWraps ?? []);
  }
  return writer.finish();
}

/**
 * Serialize an envelope to its wire format.
 *
 * @throws {RangeError} If a signed type has no signature or a field has the wrong size.
 */
export function encodeEnvelope(envelope: Envelope): Uint8Array {
  const writer = new ByteWriter();
  writeHeader(writer, envelope);
  writeBody(writer, envelope);
  if (isSignedType(envelope.msgType)) {
    if (!envelope.signature) {
      throw new RangeError(`${envelope.msgType} envelopes must be signed`);
    }
    writer.fixed(envelope.signature, SIGNATURE_LENGTH, "Signature");
  }
  if (envelope.msgType === "KEYLOAD") {
    writeKeyWraps(writer, envelope.keyWraps ?? []);
  }
  return writer.finish();
}

// ─── Decode ────────────────────────────────────────────────────────

function readKeyWraps(reader: ByteReader): KeyWrapBlock[] {
  const count = reader.u16();
  const wraps: KeyWrapBlock[] = [];
  for (let i = 0; i < count; i++) {
    const kind = reader.u8();
    if (kind === WRAP_KIND_PUBLIC_KEY) {
      wraps.push({
        kind: "PUBLIC_KEY",
        recipient: asPublicKey(reader.bytes(PUBLIC_KEY_LENGTH)),
        ephemeral: asExchangeKey(reader.bytes(PUBLIC_KEY_LENGTH)),
        nonce: reader.bytes(NONCE_LENGTH),
        wrapped: reader.bytes(WRAPPED_KEY_LENGTH),
      });
    } else if (kind === WRAP_KIND_PSK) {
      wraps.push({
        kind: "PSK",
        pskId: pskIdOf(reader.bytes(PSK_ID_LENGTH)),
        nonce: reader.bytes(NONCE_LENGTH),
        wrapped: reader.bytes(WRAPPED_KEY_LENGTH),
      });
    } else {
      throw new ChannelError(`Unknown key wrap kind 0x${kind.toString(16)}`, "UNKNOWN_MSG_TYPE");
    }
  }
  return wraps;
}

/**
 * Parse a wire-format envelope.
 *
 * @throws {ChannelError} code=TRUNCATED_ENVELOPE if bytes are missing or left over.
 * @throws {ChannelError} code=UNKNOWN_MSG_TYPE for an unknown version, type or wrap kind.
 */
export function decodeEnvelope(buffer: Uint8Array): Envelope {
  const reader = new ByteReader(buffer);

  const version = reader.u8();
  if (version !== ENVELOPE_VERSION) {
    throw new ChannelError(`Unsupported envelope version ${version}`, "UNKNOWN_MSG_TYPE");
  }
  const msgType = decodeMsgType(reader.u8());
  const instanceId = instanceIdFromBytes(reader.bytes(INSTANCE_ID_LENGTH));
  const messageId = messageIdFromBytes(reader.bytes(MESSAGE_ID_LENGTH));
  const publisher = asPublicKey(reader.bytes(PUBLIC_KEY_LENGTH));
  const seq = reader.u32();
  const branchId = messageIdFromBytes(reader.bytes(MESSAGE_ID_LENGTH));

  const prevCount = reader.u8();
  const previous: MessageId[] = [];
  for (let i = 0; i < prevCount; i++) {
    previous.push(messageIdFromBytes(reader.bytes(MESSAGE_ID_LENGTH)));
  }

  const publicPayload = reader.bytes(reader.u32());
  const nonce = reader.bytes(NONCE_LENGTH);
  const maskedPayload = reader.bytes(reader.u32());
  const signature = isSignedType(msgType)
    ? asSignature(reader.bytes(SIGNATURE_LENGTH))
    : undefined;
  const keyWraps = msgType === "KEYLOAD" ? readKeyWraps(reader) : undefined;

  if (reader.remaining !== 0) {
    throw new ChannelError(
      `Envelope has ${reader.remaining} trailing byte(s)`,
      "TRUNCATED_ENVELOPE"
    );
  }

  return {
    msgType,
    instanceId,
    messageId,
    publisher,
    seq,
    branchId,
    previous,
    publicPayload,
    nonce,
    maskedPayload,
    ...(signature ? { signature } : {}),
    ...(keyWraps ? { keyWraps } : {}),
  };
}
