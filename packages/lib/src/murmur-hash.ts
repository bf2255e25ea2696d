const encoder = new TextEncoder();

/**
 * 32-bit MurmurHash3 over the UTF-8 bytes of `key`.
 */
export const murmurHash3 = (key: string, seed: number = 0): number => {
  const data = encoder.encode(key);
  let h1 = seed;
  const remainder = data.length % 4;
  const bytes = data.length - remainder;
  const c1 = 0xcc9e2d51;
  const c2 = 0x1b873593;

  for (let i = 0; i < bytes; i += 4) {
    let k1 =
      data[i] |
      (data[i + 1] << 8) |
      (data[i + 2] << 16) |
      (data[i + 3] << 24);

    k1 = Math.imul(k1, c1);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, c2);

    h1 ^= k1;
    h1 = (h1 << 13) | (h1 >>> 19);
    h1 = Math.imul(h1, 5) + 0xe6546b64;
  }

  let k1 = 0;

  switch (remainder) {
    case 3:
      k1 ^= data[bytes + 2] << 16;
    case 2:
      k1 ^= data[bytes + 1] << 8;
    case 1:
      k1 ^= data[bytes];
      k1 = Math.imul(k1, c1);
      k1 = (k1 << 15) | (k1 >>> 17);
      k1 = Math.imul(k1, c2);
      h1 ^= k1;
  }

  h1 ^= data.length;

  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;

  return h1 >>> 0;
};

const SECOND_SEED = 0x9747b28c;

const hex = (value: number): string => value.toString(16).padStart(8, "0");

/**
 * Content key for an ordered list of parts. Two seeds give a 64-bit key;
 * parts are separated so `["ab", "c"]` and `["a", "bc"]` differ.
 */
export const fingerprint = (
  parts: readonly (string | number | boolean)[]
): string => {
  const joined = parts.map((part) => `${typeof part}:${part}`).join("\u0000");
  return `${hex(murmurHash3(joined))}${hex(murmurHash3(joined, SECOND_SEED))}`;
};
