// Bounded little-endian reader / writer shared by every wire structure.

import { FieldOverflow, MalformedMessage } from "../errors";
import {
  asPublicKey,
  asSignature,
  PUBLIC_KEY_SIZE,
  SIGNATURE_SIZE,
  type PublicKey,
  type Signature,
} from "../types/brands";

const I64_MIN = -(1n << 63n);
const I64_MAX = (1n << 63n) - 1n;
const U64_MAX = (1n << 64n) - 1n;

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/* ── reader ──────────────────────────────────────────────── */

export class ByteReader {
  private offset = 0;
  private readonly buf: Buffer;

  constructor(
    bytes: Uint8Array,
    private readonly label: string,
  ) {
    this.buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }

  private take(width: number): number {
    if (width > this.remaining) {
      throw new MalformedMessage(
        `${this.label}: needs ${width} bytes at offset ${this.offset}, ${this.remaining} left`,
      );
    }
    const at = this.offset;
    this.offset += width;
    return at;
  }

  u8 = (): number => this.buf.readUInt8(this.take(1));
  i8 = (): number => this.buf.readInt8(this.take(1));
  u16 = (): number => this.buf.readUInt16LE(this.take(2));
  i16 = (): number => this.buf.readInt16LE(this.take(2));
  u32 = (): number => this.buf.readUInt32LE(this.take(4));
  i32 = (): number => this.buf.readInt32LE(this.take(4));
  u64 = (): bigint => this.buf.readBigUInt64LE(this.take(8));
  i64 = (): bigint => this.buf.readBigInt64LE(this.take(8));

  skip(width: number): void {
    this.take(width);
  }

  /** Copy of the next `width` bytes. */
  bytes(width: number): Uint8Array {
    const at = this.take(width);
    return new Uint8Array(this.buf.subarray(at, at + width));
  }

  publicKey = (): PublicKey => asPublicKey(this.bytes(PUBLIC_KEY_SIZE));
  signature = (): Signature => asSignature(this.bytes(SIGNATURE_SIZE));

  /** NUL-padded ASCII slot. */
  text(width: number): string {
    const raw = this.bytes(width);
    const end = raw.indexOf(0);
    return Buffer.from(end === -1 ? raw : raw.subarray(0, end)).toString("latin1");
  }

  /** `count` consecutive `width`-byte entries. */
  array(count: number, width: number): Uint8Array[] {
    return Array.from({ length: count }, () => this.bytes(width));
  }

  /** Fixed structures must consume the buffer exactly. */
  finish(): void {
    if (this.remaining !== 0) {
      throw new MalformedMessage(
        `${this.label}: ${this.remaining} trailing bytes after offset ${this.offset}`,
      );
    }
  }
}

/* ── writer ──────────────────────────────────────────────── */

export class ByteWriter {
  private offset = 0;
  private readonly buf: Buffer;

  constructor(
    size: number,
    private readonly label: string,
  ) {
    this.buf = Buffer.alloc(size);
  }

  private field(name: string): string {
    return `${this.label}.${name}`;
  }

  private int(value: number, min: number, max: number, name: string): void {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new FieldOverflow(this.field(name), `${value} is outside [${min}, ${max}]`);
    }
  }

  private big(value: bigint, min: bigint, max: bigint, name: string): void {
    if (typeof value !== "bigint" || value < min || value > max) {
      throw new FieldOverflow(this.field(name), `${String(value)} is outside [${min}, ${max}]`);
    }
  }

  private advance(width: number): number {
    const at = this.offset;
    if (at + width > this.buf.length) {
      throw new FieldOverflow(this.label, `structure exceeds its ${this.buf.length}-byte layout`);
    }
    this.offset += width;
    return at;
  }

  u8(value: number, name: string): this {
    this.int(value, 0, 0xff, name);
    this.buf.writeUInt8(value, this.advance(1));
    return this;
  }

  i8(value: number, name: string): this {
    this.int(value, -0x80, 0x7f, name);
    this.buf.writeInt8(value, this.advance(1));
    return this;
  }

  u16(value: number, name: string): this {
    this.int(value, 0, 0xffff, name);
    this.buf.writeUInt16LE(value, this.advance(2));
    return this;
  }

  i16(value: number, name: string): this {
    this.int(value, -0x8000, 0x7fff, name);
    this.buf.writeInt16LE(value, this.advance(2));
    return this;
  }

  u32(value: number, name: string): this {
    this.int(value, 0, 0xffffffff, name);
    this.buf.writeUInt32LE(value, this.advance(4));
    return this;
  }

  i32(value: number, name: string): this {
    this.int(value, -0x80000000, 0x7fffffff, name);
    this.buf.writeInt32LE(value, this.advance(4));
    return this;
  }

  u64(value: bigint, name: string): this {
    this.big(value, 0n, U64_MAX, name);
    this.buf.writeBigUInt64LE(value, this.advance(8));
    return this;
  }

  i64(value: bigint, name: string): this {
    this.big(value, I64_MIN, I64_MAX, name);
    this.buf.writeBigInt64LE(value, this.advance(8));
    return this;
  }

  zeros(width: number): this {
    this.advance(width);
    return this;
  }

  /** Exactly `width` bytes; anything else is a caller bug, not padding. */
  bytes(value: Uint8Array, width: number, name: string): this {
    if (value.length !== width) {
      throw new FieldOverflow(this.field(name), `expected ${width} bytes, got ${value.length}`);
    }
    this.buf.set(value, this.advance(width));
    return this;
  }

  /** Variable-length tail whose length was already written. */
  raw(value: Uint8Array): this {
    this.buf.set(value, this.advance(value.length));
    return this;
  }

  /** ASCII into a NUL-padded slot. */
  text(value: string, width: number, name: string): this {
    if (!PRINTABLE_ASCII.test(value)) {
      throw new FieldOverflow(this.field(name), `"${value}" is not printable ASCII`);
    }
    if (value.length > width) {
      throw new FieldOverflow(this.field(name), `"${value}" exceeds its ${width}-byte slot`);
    }
    const at = this.advance(width);
    this.buf.write(value, at, "latin1");
    return this;
  }

  array(values: readonly Uint8Array[], count: number, width: number, name: string): this {
    if (values.length !== count) {
      throw new FieldOverflow(this.field(name), `expected ${count} entries, got ${values.length}`);
    }
    values.forEach((v, i) => this.bytes(v, width, `${name}[${i}]`));
    return this;
  }

  finish(): Buffer {
    if (this.offset !== this.buf.length) {
      throw new FieldOverflow(
        this.label,
        `wrote ${this.offset} of ${this.buf.length} bytes`,
      );
    }
    return this.buf;
  }
}
