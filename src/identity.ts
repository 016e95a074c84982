import { padBase64, strictBase64Decode } from "./decoder.js";
import { matchScheme, type SupportedScheme } from "./extractor.js";
import type { IdentityOptions, NodeIdentity, NodeLink } from "./types.js";

export const DEFAULT_IDENTITY_OPTIONS: IdentityOptions = {
  payloadLength: 100,
  rawLength: 200,
};

/** A protocol-specific rule; returns null to hand over to the next rule. */
export type IdentityRule = (scheme: SupportedScheme, payload: string) => NodeIdentity | null;

const VMESS_SERVER = /"(?:add|server|address)"\s*:\s*"([^"]+)"/;
const VMESS_PORT = /"port"\s*:\s*"?(\d+)"?/;
const AT_HOST_PORT = /@(\[[^\]]*\]|[^\s:/?#@[\]]+):(\d+)/;

export const vmessIdentity: IdentityRule = (scheme, payload) => {
  const encoded = payload.split("#", 1)[0].trim().replace(/-/g, "+").replace(/_/g, "/");
  const json = strictBase64Decode(padBase64(encoded));
  if (json === null) {
    return null;
  }
  const server = VMESS_SERVER.exec(json)?.[1];
  const port = VMESS_PORT.exec(json)?.[1];
  if (!server || !port) {
    return null;
  }
  return `${scheme}:${server.trim().toLowerCase()}:${port}`;
};

export const hostPortIdentity: IdentityRule = (scheme, payload) => {
  const match = AT_HOST_PORT.exec(payload);
  if (!match) {
    return null;
  }
  return `${scheme}:${match[1].toLowerCase()}:${match[2]}`;
};

const RULES: Partial<Record<SupportedScheme, IdentityRule>> = {
  vmess: vmessIdentity,
  vless: hostPortIdentity,
  trojan: hostPortIdentity,
};

export function fallbackIdentity(scheme: string, payload: string, length: number): NodeIdentity {
  const stem = payload.split(/[#?/]/, 1)[0];
  return `${scheme}:${stem.slice(0, length)}`;
}

/**
 * Dedup key for a node link: `<scheme>:<host>:<port>` where the protocol exposes
 * an endpoint, otherwise a truncated prefix of the payload. Pure and total.
 */
export function identify(link: NodeLink, options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS): NodeIdentity {
  try {
    const scheme = matchScheme(link);
    if (!scheme) {
      return link.slice(0, options.rawLength);
    }
    const payload = link.slice(scheme.length + "://".length);
    const endpoint = RULES[scheme]?.(scheme, payload);
    return endpoint ?? fallbackIdentity(scheme, payload, options.payloadLength);
  } catch {
    return link.slice(0, options.rawLength);
  }
}
