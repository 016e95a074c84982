import { Buffer } from "node:buffer";
import { logger } from "./logger.js";

const BASE64_ALPHABET = /^[A-Za-z0-9+/=]+$/;
const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes `input` only when it is canonical, padded base64 whose bytes are valid UTF-8.
 * Returns null otherwise; Buffer's own decoder silently skips bad characters.
 */
export function strictBase64Decode(input: string): string | null {
  if (!input || !STRICT_BASE64.test(input)) {
    return null;
  }
  try {
    return utf8.decode(Buffer.from(input, "base64"));
  } catch {
    return null;
  }
}

export function padBase64(input: string): string {
  const missing = (4 - (input.length % 4)) % 4;
  return input + "=".repeat(missing);
}

/**
 * Unwraps sources that publish their whole node list as one base64 blob.
 * Anything that is not decodable base64 is returned unchanged as plaintext.
 */
export function decodeContent(rawText: string): string {
  const compact = rawText.replace(/\s+/g, "");
  if (!compact || !BASE64_ALPHABET.test(compact)) {
    return rawText;
  }
  const decoded = strictBase64Decode(compact) ?? strictBase64Decode(padBase64(compact));
  if (decoded === null) {
    logger.debug("Content is not valid base64; treating as plaintext", { length: compact.length });
    return rawText;
  }
  return decoded;
}
