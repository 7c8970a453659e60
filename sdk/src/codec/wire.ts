import { LedgerError } from '../errors.js';
import { concatBytes } from '../utils.js';

/**
 * Protobuf wire primitives.
 *
 * The writer follows proto3 presence rules through its method names: scalar
 * writers skip zero values, `message` always writes (an empty message is
 * still "set").
 */

export enum WireType {
  Varint = 0,
  Fixed64 = 1,
  LengthDelimited = 2,
  StartGroup = 3,
  EndGroup = 4,
  Fixed32 = 5,
}

const MAX_FIELD_NUMBER = 0x1fffffff;
const UINT64_MAX = (1n << 64n) - 1n;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

export class ProtoWriter {
  private readonly parts: Uint8Array[] = [];
  private pending: number[] = [];

  private flush(): void {
    if (this.pending.length > 0) {
      this.parts.push(Uint8Array.from(this.pending));
      this.pending = [];
    }
  }

  private rawVarint(value: bigint): void {
    let v = value;
    while (v >= 0x80n) {
      this.pending.push(Number(v & 0x7fn) | 0x80);
      v >>= 7n;
    }
    this.pending.push(Number(v));
  }

  private tag(field: number, wireType: WireType): void {
    this.rawVarint(BigInt((field << 3) | wireType) & 0xffffffffn);
  }

  private lengthDelimited(field: number, data: Uint8Array): this {
    this.tag(field, WireType.LengthDelimited);
    this.rawVarint(BigInt(data.length));
    this.flush();
    this.parts.push(data);
    return this;
  }

  uint64(field: number, value: bigint | number): this {
    const v = BigInt(value);
    if (v === 0n) return this;
    if (v < 0n || v > UINT64_MAX) {
      throw LedgerError.invalidArgument(`Field ${field} is out of uint64 range`, { value: v });
    }
    this.tag(field, WireType.Varint);
    this.rawVarint(v);
    return this;
  }

  /** Negative values are written as their 64-bit two's complement */
  int64(field: number, value: bigint | number): this {
    const v = BigInt(value);
    if (v === 0n) return this;
    this.tag(field, WireType.Varint);
    this.rawVarint(BigInt.asUintN(64, v));
    return this;
  }

  int32(field: number, value: number): this {
    return this.int64(field, value);
  }

  sint64(field: number, value: bigint): this {
    if (value === 0n) return this;
    this.tag(field, WireType.Varint);
    this.rawVarint(BigInt.asUintN(64, (value << 1n) ^ (value >> 63n)));
    return this;
  }

  bool(field: number, value: boolean): this {
    if (!value) return this;
    this.tag(field, WireType.Varint);
    this.pending.push(1);
    return this;
  }

  string(field: number, value: string): this {
    if (value.length === 0) return this;
    return this.lengthDelimited(field, textEncoder.encode(value));
  }

  bytes(field: number, value: Uint8Array): this {
    if (value.length === 0) return this;
    return this.lengthDelimited(field, value);
  }

  /** Writes an already-encoded sub-message, even when it is empty */
  message(field: number, encoded: Uint8Array): this {
    return this.lengthDelimited(field, encoded);
  }

  /** Encodes and writes `value` unless it is `undefined` */
  optional<T>(field: number, value: T | undefined, encode: (value: T) => Uint8Array): this {
    if (value === undefined) return this;
    return this.message(field, encode(value));
  }

  repeated<T>(field: number, values: readonly T[], encode: (value: T) => Uint8Array): this {
    for (const value of values) {
      this.message(field, encode(value));
    }
    return this;
  }

  finish(): Uint8Array {
    this.flush();
    return concatBytes(...this.parts);
  }
}

export interface FieldTag {
  field: number;
  wireType: WireType;
}

/**
 * Sequential reader over one encoded message. Every read that can fail throws
 * `MALFORMED_ENCODING` with the offset at which decoding stopped.
 */
export class ProtoReader {
  private offset = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get done(): boolean {
    return this.offset >= this.buffer.length;
  }

  private fail(reason: string): LedgerError {
    return LedgerError.malformedEncoding(reason, { offset: this.offset });
  }

  private rawVarint(): bigint {
    let result = 0n;
    let shift = 0n;
    for (let i = 0; i < 10; i++) {
      if (this.offset >= this.buffer.length) {
        throw this.fail('truncated varint');
      }
      const byte = this.buffer[this.offset++];
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) {
        if (result > UINT64_MAX) throw this.fail('varint exceeds 64 bits');
        return result;
      }
      shift += 7n;
    }
    throw this.fail('varint longer than 10 bytes');
  }

  private expect(actual: WireType, expected: WireType): void {
    if (actual !== expected) {
      throw this.fail(`wire type ${actual} where ${expected} was expected`);
    }
  }

  tag(): FieldTag {
    const raw = this.rawVarint();
    if (raw > 0xffffffffn) throw this.fail('tag out of range');
    const value = Number(raw);
    const field = Math.floor(value / 8);
    const wireType = value & 7;
    if (field === 0 || field > MAX_FIELD_NUMBER) {
      throw this.fail(`invalid field number ${field}`);
    }
    switch (wireType) {
      case WireType.Varint:
      case WireType.Fixed64:
      case WireType.LengthDelimited:
      case WireType.Fixed32:
        return { field, wireType };
      case WireType.StartGroup:
      case WireType.EndGroup:
        throw this.fail(`group wire type on field ${field} is not supported`);
      default:
        throw this.fail(`unknown wire type ${wireType} on field ${field}`);
    }
  }

  uint64(wireType: WireType): bigint {
    this.expect(wireType, WireType.Varint);
    return this.rawVarint();
  }

  int64(wireType: WireType): bigint {
    return BigInt.asIntN(64, this.uint64(wireType));
  }

  sint64(wireType: WireType): bigint {
    const raw = this.uint64(wireType);
    return (raw >> 1n) ^ -(raw & 1n);
  }

  int32(wireType: WireType): number {
    const value = this.int64(wireType);
    if (value < -0x80000000n || value > 0x7fffffffn) {
      throw this.fail('int32 value out of range');
    }
    return Number(value);
  }

  uint32(wireType: WireType): number {
    const value = this.uint64(wireType);
    if (value > 0xffffffffn) throw this.fail('uint32 value out of range');
    return Number(value);
  }

  /** An int64 that must fit a JavaScript safe integer */
  safeInteger(wireType: WireType): number {
    const value = this.int64(wireType);
    if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw this.fail('integer exceeds safe range');
    }
    return Number(value);
  }

  bool(wireType: WireType): boolean {
    return this.uint64(wireType) !== 0n;
  }

  bytes(wireType: WireType): Uint8Array {
    this.expect(wireType, WireType.LengthDelimited);
    const length = this.rawVarint();
    if (length > BigInt(this.buffer.length - this.offset)) {
      throw this.fail('length-delimited field runs past end of input');
    }
    const end = this.offset + Number(length);
    const out = this.buffer.slice(this.offset, end);
    this.offset = end;
    return out;
  }

  string(wireType: WireType): string {
    const data = this.bytes(wireType);
    try {
      return textDecoder.decode(data);
    } catch (error) {
      throw LedgerError.malformedEncoding('invalid UTF-8 in string field', {
        offset: this.offset,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  skip(wireType: WireType): void {
    switch (wireType) {
      case WireType.Varint:
        this.rawVarint();
        return;
      case WireType.LengthDelimited:
        this.bytes(wireType);
        return;
      case WireType.Fixed64:
        this.advance(8);
        return;
      case WireType.Fixed32:
        this.advance(4);
        return;
      default:
        throw this.fail(`cannot skip wire type ${wireType}`);
    }
  }

  private advance(count: number): void {
    if (this.offset + count > this.buffer.length) {
      throw this.fail('fixed-width field runs past end of input');
    }
    this.offset += count;
  }
}

/**
 * Decode a message by dispatching each field to `onField`. Fields it does not
 * consume (returns `false`) are skipped.
 */
export function readMessage(
  bytes: Uint8Array,
  onField: (field: number, wireType: WireType, reader: ProtoReader) => boolean
): void {
  const reader = new ProtoReader(bytes);
  while (!reader.done) {
    const { field, wireType } = reader.tag();
    if (!onField(field, wireType, reader)) {
      reader.skip(wireType);
    }
  }
}
