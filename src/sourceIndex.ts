import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parseConfigText } from "./config.js";

function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("URL cannot be empty");
  }
  const hasScheme = /^https?:\/\//i.test(trimmed);
  if (!hasScheme && /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new Error(`Only http(s) sources are supported: ${trimmed}`);
  }
  let url: URL;
  try {
    url = new URL(hasScheme ? trimmed : `https://${trimmed}`);
  } catch {
    throw new Error(`Invalid URL: ${trimmed}`);
  }
  url.hash = "";
  return url.toString();
}

async function readConfigText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    const code = (error as { code?: string } | undefined)?.code;
    if (code === "ENOENT") {
      return "";
    }
    throw error;
  }
}

export interface AddSourceOptions {
  configPath: string;
  url: string;
}

export interface AddSourceResult {
  added: boolean;
  url: string;
  configPath: string;
}

/** Appends a `SOURCES=` line unless the URL is already registered. */
export async function addSourceToConfig(options: AddSourceOptions): Promise<AddSourceResult> {
  const url = normalizeUrl(options.url);
  const configPath = resolve(options.configPath);
  const text = await readConfigText(configPath);
  const known = parseConfigText(text).sources.map((source) => source.toLowerCase());
  if (known.includes(url.toLowerCase())) {
    return { added: false, url, configPath };
  }
  await mkdir(dirname(configPath), { recursive: true });
  const separator = text && !text.endsWith("\n") ? "\n" : "";
  await appendFile(configPath, `${separator}SOURCES=${url}\n`, "utf8");
  return { added: true, url, configPath };
}
