import { canonicalCborDecode, canonicalCborEncode, CborDecodeError } from './canonical-cbor';
import { domainHash, sha256 } from './index';

const hex = (b: Buffer) => b.toString('hex');

describe('canonicalCborEncode', () => {
  it('uses the shortest integer form', () => {
    expect(hex(canonicalCborEncode(0))).toBe('00');
    expect(hex(canonicalCborEncode(23))).toBe('17');
    expect(hex(canonicalCborEncode(24))).toBe('1818');
    expect(hex(canonicalCborEncode(500n))).toBe('1901f4');
    expect(hex(canonicalCborEncode(-1))).toBe('20');
  });

  it('encodes integers above uint64 as tag-2 bignums', () => {
    expect(hex(canonicalCborEncode(2n ** 64n))).toBe('c249010000000000000000');
  });

  it('sorts map keys by length, then bytewise', () => {
    expect(hex(canonicalCborEncode({ b: 1, a: 2 }))).toBe('a2616102616201');
    expect(hex(canonicalCborEncode({ aa: 1, b: 2 }))).toBe('a261620262616101');
  });

  it('encodes text and byte strings with their major types', () => {
    expect(hex(canonicalCborEncode('a'))).toBe('6161');
    expect(hex(canonicalCborEncode(Buffer.from([1, 2])))).toBe('420102');
  });

  it('rejects floats', () => {
    expect(() => canonicalCborEncode(1.5)).toThrow('floats');
  });
});

describe('canonicalCborDecode', () => {
  it('decodes arrays with integers as bigint', () => {
    const decoded = canonicalCborDecode(Buffer.from('830141016178', 'hex'));
    expect(decoded).toEqual([1n, Buffer.from([1]), 'x']);
  });

  it('decodes what the encoder produces', () => {
    const value = { amount: 2n ** 70n, owner: 'seller', tags: [1n, 2n], ok: true, none: null };
    expect(canonicalCborDecode(canonicalCborEncode(value))).toEqual(value);
  });

  it('rejects non-shortest integers', () => {
    expect(() => canonicalCborDecode(Buffer.from('1817', 'hex'))).toThrow(CborDecodeError);
  });

  it('rejects trailing bytes', () => {
    expect(() => canonicalCborDecode(Buffer.from('0000', 'hex'))).toThrow('Trailing bytes');
  });

  it('rejects floats', () => {
    expect(() => canonicalCborDecode(Buffer.from('f93c00', 'hex'))).toThrow(CborDecodeError);
  });

  it('rejects maps whose keys are out of canonical order', () => {
    expect(() => canonicalCborDecode(Buffer.from('a2616202616101', 'hex'))).toThrow(CborDecodeError);
  });

  it('rejects truncated input', () => {
    expect(() => canonicalCborDecode(Buffer.from('4301', 'hex'))).toThrow(CborDecodeError);
  });

  it('rejects bignums that fit in uint64', () => {
    expect(() => canonicalCborDecode(Buffer.from('c24101', 'hex'))).toThrow(CborDecodeError);
  });
});

describe('domainHash', () => {
  it('hashes domain || 0x00 || canonical CBOR', () => {
    const expected = sha256(
      Buffer.concat([Buffer.from('TEST_DOMAIN', 'utf8'), Buffer.from([0]), Buffer.from('820102', 'hex')])
    );
    expect(domainHash('TEST_DOMAIN', [1, 2])).toBe(expected);
  });

  it('separates domains', () => {
    expect(domainHash('A', 'x')).not.toBe(domainHash('B', 'x'));
  });
});
