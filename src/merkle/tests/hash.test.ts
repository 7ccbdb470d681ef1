import {
  Digest,
  SHA256,
  SHA3_256,
  getHashFunction,
  hashPair,
  isHashAlgorithm,
} from '../hash';

const SHA256_ABC = '0xba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
const SHA3_256_ABC = '0x3a985da74fe225b2045c172d6bd390bd855f086e3e9d525b46bfe24511431532';
const ZERO = '0x' + '00'.repeat(32);

describe('SHA256', () => {
  it('should match the known digest of "abc"', () => {
    expect(SHA256.encode(SHA256.hash('abc'))).toBe(SHA256_ABC);
  });

  it('should hash strings as UTF-8 bytes', () => {
    const fromString = SHA256.hash('abc');
    const fromBytes = SHA256.hash(new Uint8Array([0x61, 0x62, 0x63]));
    expect(fromString.equals(fromBytes)).toBe(true);
  });

  it('should produce consistent hash for same input', () => {
    expect(SHA256.hash('hello').equals(SHA256.hash('hello'))).toBe(true);
  });

  it('should produce different hash for different input', () => {
    expect(SHA256.hash('hello').equals(SHA256.hash('world'))).toBe(false);
  });
});

describe('SHA3_256', () => {
  it('should match the known digest of "abc"', () => {
    expect(SHA3_256.encode(SHA3_256.hash('abc'))).toBe(SHA3_256_ABC);
  });

  it('should differ from SHA256 for the same input', () => {
    expect(SHA3_256.encode(SHA3_256.hash('abc'))).not.toBe(SHA256.encode(SHA256.hash('abc')));
  });
});

describe('encode', () => {
  it('should produce 0x followed by 64 lowercase hex characters', () => {
    const encoded = SHA256.encode(SHA256.hash('test'));
    expect(encoded).toHaveLength(66);
    expect(encoded).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('should match Digest.toString', () => {
    const digest = SHA3_256.hash('test');
    expect(SHA3_256.encode(digest)).toBe(digest.toString());
  });
});

describe('decode', () => {
  it('should invert encode', () => {
    const digest = SHA256.hash('round trip');
    expect(SHA256.decode(SHA256.encode(digest)).equals(digest)).toBe(true);
  });

  it('should tag the decoded digest with the hash function algorithm', () => {
    expect(SHA3_256.decode(SHA256_ABC).algorithm).toBe('sha3-256');
  });

  it('should reject a missing prefix', () => {
    expect(() => SHA256.decode(SHA256_ABC.slice(2))).toThrow('Invalid sha256 digest encoding');
  });

  it('should reject uppercase hex', () => {
    expect(() => SHA256.decode('0x' + SHA256_ABC.slice(2).toUpperCase())).toThrow(
      'Invalid sha256 digest encoding'
    );
  });

  it('should reject the wrong length', () => {
    expect(() => SHA256.decode('0xabcd')).toThrow('Invalid sha256 digest encoding');
  });
});

describe('zero', () => {
  it('should be the all-zero digest', () => {
    const zero = SHA256.zero();
    expect(zero.isZero()).toBe(true);
    expect(SHA256.encode(zero)).toBe(ZERO);
  });

  it('should not equal the zero digest of another family', () => {
    expect(SHA256.zero().equals(SHA3_256.zero())).toBe(false);
  });
});

describe('Digest', () => {
  it('should reject byte arrays that are not 32 bytes', () => {
    expect(() => new Digest('sha256', new Uint8Array(31))).toThrow('Digest must be 32 bytes, got 31');
  });

  it('should copy its input bytes', () => {
    const bytes = new Uint8Array(32);
    const digest = new Digest('sha256', bytes);
    bytes[0] = 1;
    expect(digest.isZero()).toBe(true);
  });

  it('should hand out copies of its bytes', () => {
    const digest = SHA256.zero();
    digest.toBytes()[0] = 1;
    expect(digest.isZero()).toBe(true);
  });
});

describe('hashPair', () => {
  it('should hash the concatenated encodings, not the raw bytes', () => {
    const left = SHA256.hash('a');
    const right = SHA256.hash('b');
    const expected = SHA256.hash(left.toString() + right.toString());
    const rawBytes = SHA256.hash(Buffer.concat([left.toBytes(), right.toBytes()]));

    expect(hashPair(SHA256, left, right).equals(expected)).toBe(true);
    expect(hashPair(SHA256, left, right).equals(rawBytes)).toBe(false);
  });

  it('should produce different hash for different order (position matters)', () => {
    const a = SHA256.hash('a');
    const b = SHA256.hash('b');
    expect(hashPair(SHA256, a, b).equals(hashPair(SHA256, b, a))).toBe(false);
  });
});

describe('getHashFunction', () => {
  it('should resolve supported algorithms', () => {
    expect(getHashFunction('sha256')).toBe(SHA256);
    expect(getHashFunction('sha3-256')).toBe(SHA3_256);
  });

  it('should return undefined for unsupported names', () => {
    expect(getHashFunction('md5')).toBeUndefined();
    expect(isHashAlgorithm('keccak')).toBe(false);
  });
});
