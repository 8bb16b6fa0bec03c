const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

// RFC 4648 alphabet, unpadded output.
export function base32Encode(bytes: Uint8Array) {
  let bits = "";
  for (const byte of bytes) {
    bits += byte.toString(2).padStart(8, "0");
  }
  let out = "";
  for (let i = 0; i < bits.length; i += 5) {
    const value = Number.parseInt(bits.slice(i, i + 5).padEnd(5, "0"), 2);
    out += BASE32_ALPHABET[value];
  }
  return out;
}

export function base32Decode(input: string) {
  const cleaned = input.toUpperCase().replace(/[\s=]/g, "");
  let bits = "";
  for (const char of cleaned) {
    const idx = BASE32_ALPHABET.indexOf(char);
    if (idx < 0) {
      throw new Error(`Invalid base32 character: ${char}`);
    }
    bits += idx.toString(2).padStart(5, "0");
  }
  const out: number[] = [];
  for (let i = 0; i + 8 <= bits.length; i += 8) {
    out.push(Number.parseInt(bits.slice(i, i + 8), 2));
  }
  return Buffer.from(out);
}
