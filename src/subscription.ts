import { Buffer } from "node:buffer";
import { mkdir, stat, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { logger } from "./logger.js";
import type { NodeLink, PublishResult } from "./types.js";

export function encodeSubscription(nodes: readonly NodeLink[]): string {
  return Buffer.from(nodes.join("\n"), "utf8").toString("base64");
}

/** Reads an artifact back into its node links. */
export function decodeSubscription(content: string): NodeLink[] {
  const text = Buffer.from(content.trim(), "base64").toString("utf8");
  return text ? text.split("\n") : [];
}

/** Overwrites `path` with `content`, creating parent directories. */
export async function writeSubscription(content: string, path: string): Promise<void> {
  const absolutePath = resolve(path);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, content, "utf8");
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    const code = (error as { code?: string } | undefined)?.code;
    if (code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export interface PublishOptions {
  write?: (content: string, path: string) => Promise<void>;
}

/**
 * Encodes and writes the artifact. Failures are logged and reported in the
 * result rather than thrown; an empty node list writes nothing.
 */
export async function publishSubscription(
  nodes: readonly NodeLink[],
  path: string,
  options: PublishOptions = {}
): Promise<PublishResult> {
  const write = options.write ?? writeSubscription;
  const absolutePath = resolve(path);
  if (!nodes.length) {
    logger.warn("No nodes to publish; subscription not written", { path: absolutePath });
    return { path: absolutePath, written: false, bytes: 0 };
  }

  logger.info("Writing subscription", { path: absolutePath, nodes: nodes.length });
  try {
    await write(encodeSubscription(nodes), absolutePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Failed to write subscription", { path: absolutePath, error: message });
    return { path: absolutePath, written: false, bytes: 0, error: message };
  }

  let size: number | null;
  try {
    size = await fileSize(absolutePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn("Could not verify subscription file", { path: absolutePath, error: message });
    return { path: absolutePath, written: true, bytes: 0, error: message };
  }
  if (size === null) {
    logger.error("Subscription file missing after write", { path: absolutePath });
    return { path: absolutePath, written: false, bytes: 0, error: "file missing after write" };
  }
  if (size === 0) {
    logger.warn("Subscription file is empty after write", { path: absolutePath });
  } else {
    logger.info("Subscription written", { path: absolutePath, bytes: size });
  }
  return { path: absolutePath, written: size > 0, bytes: size };
}
