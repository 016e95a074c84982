import type { NodeLink } from "./types.js";

export const SUPPORTED_SCHEMES = [
  "vmess",
  "v2ray",
  "trojan",
  "trojan-go",
  "shadowsocks",
  "shadowsocksr",
  "vless",
  "ss",
  "ssr",
  "hysteria",
  "hysteria2",
  "tuic",
  "wireguard",
  "naiveproxy",
  "socks",
  "http",
  "https",
  "clash",
  "shadowsocks2",
  "vmess+tls",
  "vless+tls",
] as const;

export type SupportedScheme = (typeof SUPPORTED_SCHEMES)[number];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Longest first so "vmess+tls" is tried before "vmess".
const NODE_LINK_PATTERN = new RegExp(
  `^(${[...SUPPORTED_SCHEMES]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|")})://`
);

export function matchScheme(line: string): SupportedScheme | null {
  const match = NODE_LINK_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const scheme = match[1];
  return SUPPORTED_SCHEMES.find((candidate) => candidate === scheme) ?? null;
}

export function isNodeLink(line: string): boolean {
  return NODE_LINK_PATTERN.test(line);
}

/** Keeps the lines that start with a supported `<scheme>://`, in file order. */
export function extractNodes(text: string): NodeLink[] {
  const nodes: NodeLink[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line && isNodeLink(line)) {
      nodes.push(line);
    }
  }
  return nodes;
}
