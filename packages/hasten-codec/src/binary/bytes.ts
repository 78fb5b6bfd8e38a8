const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

/** Lexicographic byte comparison (shorter prefix sorts first). */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

export function utf8Encode(value: string): Uint8Array {
  return utf8Encoder.encode(value);
}

/** Strict UTF-8 decode; throws TypeError on malformed input. */
export function utf8Decode(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/** Hex dump of a byte window, marking `mark` with brackets. */
export function hexWindow(buf: Uint8Array, mark: number, length = 16): string {
  const start = Math.max(0, mark - 8);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === mark ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
