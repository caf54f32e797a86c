const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function fromString(str: string): Uint8Array {
  return encoder.encode(str);
}

/** Lenient decode: invalid sequences become U+FFFD. */
export function decodeToString(data: Uint8Array): string {
  return decoder.decode(data);
}

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
