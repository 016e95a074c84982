import { Buffer } from "node:buffer";
import { describe, it, expect } from "vitest";
import { fallbackIdentity, identify } from "../src/identity.js";

function vmessLink(config: Record<string, unknown>, unpadded = false): string {
  const encoded = Buffer.from(JSON.stringify(config), "utf8").toString("base64");
  return `vmess://${unpadded ? encoded.replace(/=+$/, "") : encoded}`;
}

describe("identify", () => {
  it("uses host and port for vless and trojan", () => {
    expect(identify("vless://x@1.2.3.4:443#r1")).toBe("vless:1.2.3.4:443");
    expect(identify("vless://y@1.2.3.4:443?security=tls#r2")).toBe("vless:1.2.3.4:443");
    expect(identify("trojan://pass@Example.COM:8443?sni=a.test#n")).toBe("trojan:example.com:8443");
  });

  it("handles bracketed IPv6 hosts", () => {
    expect(identify("vless://id@[2001:db8::1]:443?type=ws")).toBe("vless:[2001:db8::1]:443");
  });

  it("decodes vmess payloads", () => {
    const config = { v: "2", ps: "remark", add: "A.test", port: "443", id: "u" };
    expect(identify(vmessLink(config))).toBe("vmess:a.test:443");
    expect(identify(vmessLink({ ...config, ps: "other" }, true))).toBe("vmess:a.test:443");
    expect(identify(vmessLink({ server: "b.test", port: 8080 }))).toBe("vmess:b.test:8080");
  });

  it("falls back to the payload prefix", () => {
    expect(identify("vmess://abc")).toBe("vmess:abc");
    expect(identify("vless://nohost#x")).toBe("vless:nohost");
    expect(identify("ss://YWVz@h.test:8388/?plugin=obfs#tag")).toBe("ss:YWVz@h.test:8388");
    expect(identify(`hysteria2://${"a".repeat(150)}`)).toBe(`hysteria2:${"a".repeat(100)}`);
  });

  it("honours configured lengths", () => {
    const options = { payloadLength: 5, rawLength: 8 };
    expect(identify("tuic://abcdefghij#x", options)).toBe("tuic:abcde");
    expect(identify("unknown://abcdefghij", options)).toBe("unknown:");
    expect(fallbackIdentity("ss", "abc?x", 2)).toBe("ss:ab");
  });

  it("uses the raw prefix for unrecognized links", () => {
    expect(identify("foo://bar")).toBe("foo://bar");
    expect(identify("x".repeat(300))).toBe("x".repeat(200));
  });

  it("is stable across calls", () => {
    const links = ["vless://x@1.2.3.4:443#r1", vmessLink({ add: "c.test", port: 1 }), "ssr://abc/def"];
    for (const link of links) {
      expect(identify(link)).toBe(identify(link));
    }
  });
});
