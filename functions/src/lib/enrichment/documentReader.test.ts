import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { tempDir } from "../testing/fakes";
import { createDocumentReader } from "./documentReader";

describe("documentReader", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => {};
  const reader = createDocumentReader({ maxPdfPages: 5, minTextLength: 20 });

  beforeEach(async () => {
    ({ dir, cleanup } = await tempDir("reader-"));
  });

  afterEach(async () => {
    await cleanup();
  });

  it("reads plain text files", async () => {
    const path = join(dir, "capitolato.txt");
    await writeFile(path, "\r\n  Requisiti di partecipazione alla gara\r\nSecondo rigo\r\n");
    expect(await reader.read(path)).toBe("Requisiti di partecipazione alla gara\nSecondo rigo");
  });

  it("ignores texts below the minimum length", async () => {
    const path = join(dir, "nota.txt");
    await writeFile(path, "breve");
    expect(await reader.read(path)).toBeNull();
  });

  it("returns null for formats it cannot read", async () => {
    const path = join(dir, "modulo.docx");
    await writeFile(path, "contenuto qualsiasi abbastanza lungo");
    expect(await reader.read(path)).toBeNull();
  });
});
