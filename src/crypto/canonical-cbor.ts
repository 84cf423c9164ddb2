function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const MIN_INT64 = -9223372036854775808n;
const MAX_UINT64 = 18446744073709551615n;

/** uint256 asset ids and wei amounts exceed uint64; they go out as tag-2 bignums. */
const TAG_POSITIVE_BIGNUM = 2;

function encodeUnsignedInt(value: bigint): Buffer {
  if (value < 0n) throw new Error('Unsigned int must be >= 0');
  return encodeMajorAndArg(0, value);
}

function encodeNegativeInt(value: bigint): Buffer {
  if (value >= 0n) throw new Error('Negative int must be < 0');
  const n = (-1n - value);
  return encodeMajorAndArg(1, n);
}

function encodeMajorAndArg(major: number, arg: bigint): Buffer {
  if (arg < 0n) throw new Error('CBOR arg must be >= 0');

  if (arg <= 23n) {
    return Buffer.from([((major << 5) | Number(arg)) & 0xff]);
  }

  if (arg <= 0xffn) {
    return Buffer.from([((major << 5) | 24) & 0xff, Number(arg) & 0xff]);
  }

  if (arg <= 0xffffn) {
    const b = Buffer.alloc(3);
    b[0] = ((major << 5) | 25) & 0xff;
    b.writeUInt16BE(Number(arg), 1);
    return b;
  }

  if (arg <= 0xffffffffn) {
    const b = Buffer.alloc(5);
    b[0] = ((major << 5) | 26) & 0xff;
    b.writeUInt32BE(Number(arg), 1);
    return b;
  }

  if (arg <= MAX_UINT64) {
    const b = Buffer.alloc(9);
    b[0] = ((major << 5) | 27) & 0xff;
    b.writeBigUInt64BE(arg, 1);
    return b;
  }

  throw new Error('CBOR integer too large (must fit in uint64)');
}

function encodeBytes(bytes: Buffer): Buffer {
  return Buffer.concat([encodeMajorAndArg(2, BigInt(bytes.length)), bytes]);
}

function encodeText(text: string): Buffer {
  const bytes = Buffer.from(text, 'utf8');
  return Buffer.concat([encodeMajorAndArg(3, BigInt(bytes.length)), bytes]);
}

function encodeArray(arr: unknown[]): Buffer {
  const parts: Buffer[] = [encodeMajorAndArg(4, BigInt(arr.length))];
  for (const item of arr) {
    parts.push(canonicalCborEncode(item));
  }
  return Buffer.concat(parts);
}

function compareBytes(a: Buffer, b: Buffer): number {
  if (a.length !== b.length) return a.length - b.length;
  return Buffer.compare(a, b);
}

function encodeMap(entries: Array<{ keyBytes: Buffer; valueBytes: Buffer }>): Buffer {
  entries.sort((x, y) => compareBytes(x.keyBytes, y.keyBytes));
  const parts: Buffer[] = [encodeMajorAndArg(5, BigInt(entries.length))];
  for (const { keyBytes, valueBytes } of entries) {
    parts.push(keyBytes);
    parts.push(valueBytes);
  }
  return Buffer.concat(parts);
}

function encodeBignumTag(tag: number, magnitude: bigint): Buffer {
  if (magnitude < 0n) throw new Error('Bignum magnitude must be >= 0');
  let hex = magnitude.toString(16);
  if (hex.length % 2 === 1) hex = `0${hex}`;
  const bytes = Buffer.from(hex, 'hex');
  const tagBytes = encodeMajorAndArg(6, BigInt(tag));
  return Buffer.concat([tagBytes, encodeBytes(bytes)]);
}

function normalizeNumberToBigInt(value: number): bigint {
  if (!Number.isFinite(value)) throw new Error('CBOR does not allow NaN/Infinity');
  if (!Number.isInteger(value)) throw new Error('CBOR canonical encoding forbids floats');
  if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
    throw new Error('Unsafe integer: represent as bigint');
  }
  return BigInt(value);
}

export function canonicalCborEncode(value: unknown): Buffer {
  if (value === null) return Buffer.from([0xf6]);

  if (value === undefined) return Buffer.from([0xf7]);

  if (typeof value === 'boolean') return Buffer.from([value ? 0xf5 : 0xf4]);

  if (typeof value === 'number') {
    const n = normalizeNumberToBigInt(value);
    return n >= 0n ? encodeUnsignedInt(n) : encodeNegativeInt(n);
  }

  if (typeof value === 'bigint') {
    if (value < 0n) {
      if (value < MIN_INT64) {
        throw new Error('Integer out of int64 range');
      }
      return encodeNegativeInt(value);
    }

    if (value > MAX_UINT64) {
      return encodeBignumTag(TAG_POSITIVE_BIGNUM, value);
    }

    return encodeUnsignedInt(value);
  }

  if (typeof value === 'string') return encodeText(value);

  if (Buffer.isBuffer(value)) return encodeBytes(value);
  if (value instanceof Uint8Array) return encodeBytes(Buffer.from(value));

  if (Array.isArray(value)) return encodeArray(value);

  if (isPlainObject(value)) {
    const entries: Array<{ keyBytes: Buffer; valueBytes: Buffer }> = [];
    for (const key of Object.keys(value)) {
      const keyBytes = encodeText(key);
      const valueBytes = canonicalCborEncode(value[key]);
      entries.push({ keyBytes, valueBytes });
    }
    return encodeMap(entries);
  }

  throw new Error(`Unsupported CBOR type: ${typeof value}`);
}

// ============================================================
// DECODING
// ============================================================

export type CborValue =
  | bigint
  | string
  | Buffer
  | boolean
  | null
  | undefined
  | CborValue[]
  | { [key: string]: CborValue };

export class CborDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CborDecodeError';
  }
}

interface Cursor {
  buf: Buffer;
  pos: number;
}

function need(cur: Cursor, n: number): void {
  if (cur.pos + n > cur.buf.length) {
    throw new CborDecodeError(`Unexpected end of input at offset ${cur.pos}`);
  }
}

/**
 * Reads the argument of an initial byte and rejects non-shortest forms,
 * so a decoded value always re-encodes to the same bytes.
 */
function readArg(cur: Cursor, info: number): bigint {
  if (info <= 23) return BigInt(info);

  let arg: bigint;
  let min: bigint;
  if (info === 24) {
    need(cur, 1);
    arg = BigInt(cur.buf[cur.pos]);
    cur.pos += 1;
    min = 24n;
  } else if (info === 25) {
    need(cur, 2);
    arg = BigInt(cur.buf.readUInt16BE(cur.pos));
    cur.pos += 2;
    min = 0x100n;
  } else if (info === 26) {
    need(cur, 4);
    arg = BigInt(cur.buf.readUInt32BE(cur.pos));
    cur.pos += 4;
    min = 0x10000n;
  } else if (info === 27) {
    need(cur, 8);
    arg = cur.buf.readBigUInt64BE(cur.pos);
    cur.pos += 8;
    min = 0x100000000n;
  } else {
    throw new CborDecodeError(`Indefinite or reserved length (info ${info}) is not canonical`);
  }

  if (arg < min) throw new CborDecodeError('Non-shortest integer encoding');
  return arg;
}

function readLength(cur: Cursor, info: number): number {
  const len = readArg(cur, info);
  if (len > BigInt(cur.buf.length - cur.pos)) {
    throw new CborDecodeError(`Declared length ${len} exceeds remaining input`);
  }
  return Number(len);
}

function decodeItem(cur: Cursor): CborValue {
  need(cur, 1);
  const initial = cur.buf[cur.pos];
  cur.pos += 1;
  const major = initial >> 5;
  const info = initial & 0x1f;

  switch (major) {
    case 0:
      return readArg(cur, info);
    case 1:
      return -1n - readArg(cur, info);
    case 2: {
      const len = readLength(cur, info);
      const bytes = Buffer.from(cur.buf.subarray(cur.pos, cur.pos + len));
      cur.pos += len;
      return bytes;
    }
    case 3: {
      const len = readLength(cur, info);
      const text = cur.buf.toString('utf8', cur.pos, cur.pos + len);
      cur.pos += len;
      return text;
    }
    case 4: {
      const len = readLength(cur, info);
      const items: CborValue[] = [];
      for (let i = 0; i < len; i++) items.push(decodeItem(cur));
      return items;
    }
    case 5: {
      const len = readLength(cur, info);
      const out: { [key: string]: CborValue } = {};
      let prevKey: Buffer | null = null;
      for (let i = 0; i < len; i++) {
        const keyStart = cur.pos;
        const key = decodeItem(cur);
        if (typeof key !== 'string') throw new CborDecodeError('Map keys must be text');
        const keyBytes = cur.buf.subarray(keyStart, cur.pos);
        if (prevKey && compareBytes(prevKey, keyBytes) >= 0) {
          throw new CborDecodeError(`Map key out of canonical order or duplicated: ${key}`);
        }
        prevKey = keyBytes;
        out[key] = decodeItem(cur);
      }
      return out;
    }
    case 6: {
      const tag = readArg(cur, info);
      if (tag !== BigInt(TAG_POSITIVE_BIGNUM)) {
        throw new CborDecodeError(`Unsupported tag ${tag}`);
      }
      const inner = decodeItem(cur);
      if (!Buffer.isBuffer(inner) || inner.length === 0 || inner[0] === 0) {
        throw new CborDecodeError('Bignum tag must wrap a non-empty byte string without leading zeros');
      }
      const value = BigInt(`0x${inner.toString('hex')}`);
      if (value <= MAX_UINT64) throw new CborDecodeError('Bignum used for a uint64 value');
      return value;
    }
    case 7:
      if (info === 20) return false;
      if (info === 21) return true;
      if (info === 22) return null;
      if (info === 23) return undefined;
      throw new CborDecodeError('Floats and simple values are not canonical');
    default:
      throw new CborDecodeError(`Unknown major type ${major}`);
  }
}

/**
 * Decodes exactly one canonical CBOR item. Integers come back as bigint.
 */
export function canonicalCborDecode(input: Buffer): CborValue {
  const cur: Cursor = { buf: input, pos: 0 };
  const value = decodeItem(cur);
  if (cur.pos !== input.length) {
    throw new CborDecodeError(`Trailing bytes after item (${input.length - cur.pos})`);
  }
  return value;
}
