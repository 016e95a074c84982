import { describe, it, expect } from "vitest";
import { extractNodes, isNodeLink, matchScheme, SUPPORTED_SCHEMES } from "../src/extractor.js";

describe("extractor", () => {
  it("keeps node lines and drops comments", () => {
    const text = [
      "# free nodes",
      "vmess://eyJhZGQiOiJhLnRlc3QifQ==",
      "",
      "# updated daily",
      "trojan://pass@b.test:443#b",
      "ss://YWVzOnB3@c.test:8388#c",
    ].join("\n");
    expect(extractNodes(text)).toEqual([
      "vmess://eyJhZGQiOiJhLnRlc3QifQ==",
      "trojan://pass@b.test:443#b",
      "ss://YWVzOnB3@c.test:8388#c",
    ]);
  });

  it("trims lines and handles CRLF", () => {
    expect(extractNodes("  vless://u@h.test:443 \r\nnoise\r\n")).toEqual(["vless://u@h.test:443"]);
  });

  it("accepts every supported scheme", () => {
    for (const scheme of SUPPORTED_SCHEMES) {
      expect(isNodeLink(`${scheme}://payload`)).toBe(true);
    }
  });

  it("rejects anything else", () => {
    expect(extractNodes("hy2://p@h.test:443\nVMESS://abc\nvmessx://abc\nfoo://bar\nsee vmess://abc")).toEqual([]);
  });

  it("resolves the longest matching scheme", () => {
    expect(matchScheme("vmess+tls://x")).toBe("vmess+tls");
    expect(matchScheme("hysteria2://x")).toBe("hysteria2");
    expect(matchScheme("trojan-go://x")).toBe("trojan-go");
    expect(matchScheme("nope://x")).toBeNull();
  });
});
