import { Buffer } from "node:buffer";
import { describe, it, expect } from "vitest";
import { decodeContent, padBase64, strictBase64Decode } from "../src/decoder.js";

const b64 = (text: string) => Buffer.from(text, "utf8").toString("base64");

describe("decoder", () => {
  it("unwraps a base64 blob", () => {
    const list = "vless://a@h.test:443#n1\nss://YWVzOnB3@h.test:8388#n2";
    expect(decodeContent(b64(list))).toBe(list);
  });

  it("adds missing padding before decoding", () => {
    expect(b64("ab")).toBe("YWI=");
    expect(decodeContent("YWI")).toBe("ab");
  });

  it("ignores line wrapping inside the blob", () => {
    const list = "trojan://p@h.test:443#node-with-a-long-remark";
    const encoded = b64(list);
    const wrapped = `${encoded.slice(0, 20)}\n${encoded.slice(20)}\n`;
    expect(decodeContent(wrapped)).toBe(list);
  });

  it("keeps plaintext lists unchanged", () => {
    const text = "# comment\nvmess://abc\n";
    expect(decodeContent(text)).toBe(text);
  });

  it("keeps alphabet-only text that does not decode to UTF-8", () => {
    expect(decodeContent("abc")).toBe("abc");
  });

  it("rejects non-canonical base64", () => {
    expect(strictBase64Decode("YWI")).toBeNull();
    expect(strictBase64Decode("Y=WI")).toBeNull();
    expect(strictBase64Decode("")).toBeNull();
    expect(strictBase64Decode("YWI=")).toBe("ab");
  });

  it("pads to a multiple of four", () => {
    expect(padBase64("YW")).toBe("YW==");
    expect(padBase64("YWJj")).toBe("YWJj");
  });
});
