export const PDF_SIGNATURE = Buffer.from("%PDF", "latin1");
export const PDF_EOF_MARKER = Buffer.from("%%EOF", "latin1");

const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;
const WHITESPACE = /\s+/g;

export function hasPdfSignature(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_SIGNATURE.length) {
    return false;
  }
  for (let i = 0; i < PDF_SIGNATURE.length; i += 1) {
    if (bytes[i] !== PDF_SIGNATURE[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Strict base64 decode. Whitespace (line wrapping) is ignored; any other
 * character outside the alphabet, misplaced padding or an impossible length
 * yields `undefined` instead of the lenient partial decode `Buffer.from` does.
 */
export function decodeBase64Strict(text: string): Buffer | undefined {
  const compact = text.replace(WHITESPACE, "");
  if (compact.length === 0 || !BASE64_BODY.test(compact) || compact.length % 4 === 1) {
    return undefined;
  }
  return Buffer.from(compact, "base64");
}

/**
 * Outer decoding of a payload: strings in the base64 alphabet are decoded,
 * other strings are taken one byte per character.
 */
export function decodeOuterPayload(blob: string | Uint8Array): Buffer {
  if (typeof blob !== "string") {
    return Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength);
  }
  return decodeBase64Strict(blob) ?? Buffer.from(blob, "latin1");
}

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export type TextCharset = "utf-8" | "latin1";

export function detectCharset(bytes: Uint8Array): TextCharset {
  try {
    utf8Decoder.decode(bytes);
    return "utf-8";
  } catch {
    return "latin1";
  }
}

export function decodeText(bytes: Uint8Array, charset: TextCharset): string {
  if (charset === "utf-8") {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("utf-8");
  }
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
}

function isWhitespaceByte(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d || byte === 0x0b || byte === 0x0c;
}

export function trimBytes(bytes: Buffer): Buffer {
  let start = 0;
  let end = bytes.length;
  while (start < end && isWhitespaceByte(bytes[start])) {
    start += 1;
  }
  while (end > start && isWhitespaceByte(bytes[end - 1])) {
    end -= 1;
  }
  return bytes.subarray(start, end);
}
