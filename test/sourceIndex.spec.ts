import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { addSourceToConfig } from "../src/sourceIndex.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "sub-aggregator-index-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("addSourceToConfig", () => {
  it("creates the config and skips repeats", async () => {
    const configPath = join(dir, "config", "config.txt");
    const first = await addSourceToConfig({ configPath, url: "https://a.test/list.txt" });
    const again = await addSourceToConfig({ configPath, url: "https://A.test/list.txt#frag" });
    expect(first).toEqual({ added: true, url: "https://a.test/list.txt", configPath });
    expect(again.added).toBe(false);
    expect(await readFile(configPath, "utf8")).toBe("SOURCES=https://a.test/list.txt\n");
  });

  it("adds a scheme and keeps existing lines", async () => {
    const configPath = join(dir, "config.txt");
    await writeFile(configPath, "TIMEOUT=3", "utf8");
    const result = await addSourceToConfig({ configPath, url: "b.test/sub" });
    expect(result.url).toBe("https://b.test/sub");
    expect(await readFile(configPath, "utf8")).toBe("TIMEOUT=3\nSOURCES=https://b.test/sub\n");
  });

  it("rejects non-http sources", async () => {
    await expect(addSourceToConfig({ configPath: join(dir, "c.txt"), url: "ftp://a.test/x" })).rejects.toThrow(
      "Only http(s) sources are supported: ftp://a.test/x"
    );
  });
});
