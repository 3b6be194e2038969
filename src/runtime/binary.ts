/**
 * Binary wire format used by generated codecs.
 *
 * Little-endian throughout. Strings and byte blobs carry a u32 length prefix,
 * optionals a 1-byte presence flag, arrays a u32 element count, enums their
 * i32 ordinal. 64-bit integers are bigint; timestamps are i64 milliseconds,
 * surfaced as Date.
 */

export class BinaryWriter {
  private buf: Buffer;
  private pos = 0;

  constructor(initialSize = 256) {
    this.buf = Buffer.alloc(initialSize);
  }

  private ensure(bytes: number): void {
    if (this.pos + bytes <= this.buf.length) return;
    let size = this.buf.length * 2;
    while (size < this.pos + bytes) size *= 2;
    const next = Buffer.alloc(size);
    this.buf.copy(next, 0, 0, this.pos);
    this.buf = next;
  }

  get length(): number {
    return this.pos;
  }

  /** Copy of the bytes written so far. */
  finish(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.pos));
  }

  writeI8(v: number): this { this.ensure(1); this.buf.writeInt8(v, this.pos); this.pos += 1; return this; }
  writeU8(v: number): this { this.ensure(1); this.buf.writeUInt8(v, this.pos); this.pos += 1; return this; }
  writeI16(v: number): this { this.ensure(2); this.buf.writeInt16LE(v, this.pos); this.pos += 2; return this; }
  writeU16(v: number): this { this.ensure(2); this.buf.writeUInt16LE(v, this.pos); this.pos += 2; return this; }
  writeI32(v: number): this { this.ensure(4); this.buf.writeInt32LE(v, this.pos); this.pos += 4; return this; }
  writeU32(v: number): this { this.ensure(4); this.buf.writeUInt32LE(v, this.pos); this.pos += 4; return this; }
  writeI64(v: bigint): this { this.ensure(8); this.buf.writeBigInt64LE(v, this.pos); this.pos += 8; return this; }
  writeU64(v: bigint): this { this.ensure(8); this.buf.writeBigUInt64LE(v, this.pos); this.pos += 8; return this; }
  writeF32(v: number): this { this.ensure(4); this.buf.writeFloatLE(v, this.pos); this.pos += 4; return this; }
  writeF64(v: number): this { this.ensure(8); this.buf.writeDoubleLE(v, this.pos); this.pos += 8; return this; }

  writeBool(v: boolean): this {
    return this.writeU8(v ? 1 : 0);
  }

  writeString(v: string): this {
    const bytes = Buffer.from(v, 'utf-8');
    this.writeU32(bytes.length);
    return this.writeRaw(bytes);
  }

  writeBytes(v: Uint8Array): this {
    this.writeU32(v.length);
    return this.writeRaw(v);
  }

  writeTimestamp(v: Date): this {
    return this.writeI64(BigInt(v.getTime()));
  }

  writeEnum(ordinal: number): this {
    return this.writeI32(ordinal);
  }

  writeOptional<T>(v: T | undefined, write: (value: T) => void): this {
    if (v === undefined) return this.writeU8(0);
    this.writeU8(1);
    write(v);
    return this;
  }

  writeArray<T>(items: readonly T[], write: (item: T) => void): this {
    this.writeU32(items.length);
    for (const item of items) write(item);
    return this;
  }

  private writeRaw(bytes: Uint8Array): this {
    this.ensure(bytes.length);
    this.buf.set(bytes, this.pos);
    this.pos += bytes.length;
    return this;
  }
}

export class BinaryReadError extends Error {
  constructor(message: string, readonly offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = 'BinaryReadError';
  }
}

export class BinaryReader {
  private pos = 0;

  constructor(private readonly buf: Buffer) {}

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.buf.length - this.pos;
  }

  private take(bytes: number): number {
    if (this.pos + bytes > this.buf.length) {
      throw new BinaryReadError(`Unexpected end of data: need ${bytes} byte(s), have ${this.remaining}`, this.pos);
    }
    const at = this.pos;
    this.pos += bytes;
    return at;
  }

  readI8(): number { return this.buf.readInt8(this.take(1)); }
  readU8(): number { return this.buf.readUInt8(this.take(1)); }
  readI16(): number { return this.buf.readInt16LE(this.take(2)); }
  readU16(): number { return this.buf.readUInt16LE(this.take(2)); }
  readI32(): number { return this.buf.readInt32LE(this.take(4)); }
  readU32(): number { return this.buf.readUInt32LE(this.take(4)); }
  readI64(): bigint { return this.buf.readBigInt64LE(this.take(8)); }
  readU64(): bigint { return this.buf.readBigUInt64LE(this.take(8)); }
  readF32(): number { return this.buf.readFloatLE(this.take(4)); }
  readF64(): number { return this.buf.readDoubleLE(this.take(8)); }

  readBool(): boolean {
    return this.readU8() !== 0;
  }

  readString(): string {
    const len = this.readU32();
    const at = this.take(len);
    return this.buf.toString('utf-8', at, at + len);
  }

  readBytes(): Buffer {
    const len = this.readU32();
    const at = this.take(len);
    return Buffer.from(this.buf.subarray(at, at + len));
  }

  readTimestamp(): Date {
    return new Date(Number(this.readI64()));
  }

  readEnum(): number {
    return this.readI32();
  }

  readOptional<T>(read: () => T): T | undefined {
    return this.readU8() !== 0 ? read() : undefined;
  }

  readArray<T>(read: () => T): T[] {
    const count = this.readU32();
    const items: T[] = [];
    for (let i = 0; i < count; i++) items.push(read());
    return items;
  }
}
