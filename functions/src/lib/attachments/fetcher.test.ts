import { readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fakeFetch, tempDir } from "../testing/fakes";
import { fetchAttachment, fileExtension, sanitizeFileName } from "./fetcher";

const BASE = { allowedExtensions: ["pdf", "txt"], maxBytes: 100, timeoutMs: 1000 };

describe("fetcher", () => {
  let dir = "";
  let cleanup: () => Promise<void> = async () => {};

  beforeEach(async () => {
    ({ dir, cleanup } = await tempDir("fetcher-"));
  });

  afterEach(async () => {
    await cleanup();
  });

  it("sanitizes file names", () => {
    expect(sanitizeFileName("bando:gara?.pdf")).toBe("bando_gara_.pdf");
    expect(sanitizeFileName("  ..hidden. ")).toBe("hidden");
    expect(sanitizeFileName("...")).toBe("attachment");
    const long = sanitizeFileName(`${"a".repeat(250)}.pdf`);
    expect(long).toHaveLength(200);
    expect(long.endsWith(".pdf")).toBe(true);
  });

  it("reads extensions case-insensitively", () => {
    expect(fileExtension("Bando.PDF")).toBe("pdf");
    expect(fileExtension("README")).toBeNull();
  });

  it("downloads a file within the cap", async () => {
    const { impl, calls } = fakeFetch({ "https://ex.it/f/doc.pdf": { body: "hello pdf" } });
    const out = await fetchAttachment("https://ex.it/f/doc.pdf", "doc.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out).toEqual({
      status: "Downloaded",
      localPath: join(dir, "doc.pdf"),
      sizeBytes: 9,
      error: null,
      transient: false,
    });
    expect(calls).toEqual(["https://ex.it/f/doc.pdf"]);
    expect(await readFile(join(dir, "doc.pdf"), "utf8")).toBe("hello pdf");
    expect(await readdir(dir)).toEqual(["doc.pdf"]);
  });

  it("rejects a disallowed extension before any request", async () => {
    const { impl, calls } = fakeFetch({});
    const out = await fetchAttachment("https://ex.it/f/setup.exe", "setup.exe", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out).toEqual({
      status: "SkippedBadExtension",
      localPath: null,
      sizeBytes: null,
      error: "Extension exe not allowed",
      transient: false,
    });
    expect(calls).toHaveLength(0);
  });

  it("fails a non-http link without a request", async () => {
    const { impl, calls } = fakeFetch({});
    const out = await fetchAttachment("ftp://ex.it/a.pdf", "a.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out.status).toBe("Failed");
    expect(out.error).toBe("Invalid URL");
    expect(calls).toHaveLength(0);
  });

  it("stops streaming past the cap and leaves no file behind", async () => {
    const { impl } = fakeFetch({ "https://ex.it/f/big.pdf": { body: "x".repeat(150) } });
    const out = await fetchAttachment("https://ex.it/f/big.pdf", "big.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out).toEqual({
      status: "SkippedTooLarge",
      localPath: null,
      sizeBytes: null,
      error: "File size exceeded during download",
      transient: false,
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it("trusts a declared Content-Length above the cap", async () => {
    const { impl } = fakeFetch({
      "https://ex.it/f/huge.pdf": {
        body: "tiny",
        headers: { "content-length": String(5 * 1024 * 1024) },
      },
    });
    const out = await fetchAttachment("https://ex.it/f/huge.pdf", "huge.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out.status).toBe("SkippedTooLarge");
    expect(out.error).toBe("File too large: 5.0 MB");
    expect(out.localPath).toBeNull();
  });

  it("treats an existing non-empty file as downloaded", async () => {
    await writeFile(join(dir, "doc.pdf"), "cached");
    const { impl, calls } = fakeFetch({});
    const out = await fetchAttachment("https://ex.it/f/doc.pdf", "doc.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out).toEqual({
      status: "Downloaded",
      localPath: join(dir, "doc.pdf"),
      sizeBytes: 6,
      error: null,
      transient: false,
    });
    expect(calls).toHaveLength(0);
  });

  it("records HTTP errors as Failed", async () => {
    const { impl } = fakeFetch({ "https://ex.it/f/doc.pdf": { status: 503, body: "busy" } });
    const out = await fetchAttachment("https://ex.it/f/doc.pdf", "doc.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out).toEqual({
      status: "Failed",
      localPath: null,
      sizeBytes: null,
      error: "HTTP error: 503",
      transient: true,
    });
  });

  it("records an empty body as Failed", async () => {
    const { impl } = fakeFetch({ "https://ex.it/f/empty.pdf": { body: "" } });
    const out = await fetchAttachment("https://ex.it/f/empty.pdf", "empty.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out.status).toBe("Failed");
    expect(out.error).toBe("Empty response body");
    expect(await readdir(dir)).toEqual([]);
  });

  it("turns network errors and timeouts into Failed", async () => {
    const broken: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const hanging: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    const a = await fetchAttachment("https://ex.it/f/a.pdf", "a.pdf", dir, {
      ...BASE,
      fetchImpl: broken,
    });
    const b = await fetchAttachment("https://ex.it/f/b.pdf", "b.pdf", dir, {
      ...BASE,
      timeoutMs: 20,
      fetchImpl: hanging,
    });
    expect(a.error).toBe("Request error: fetch failed");
    expect(a.transient).toBe(true);
    expect(b.status).toBe("Failed");
    expect(b.error).toBe("Download timeout");
    expect(b.transient).toBe(true);
  });

  it("does not retry a missing document", async () => {
    const { impl } = fakeFetch({});
    const out = await fetchAttachment("https://ex.it/f/gone.pdf", "gone.pdf", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(out.error).toBe("HTTP error: 404");
    expect(out.transient).toBe(false);
  });

  it("fetches from script download endpoints", async () => {
    const { impl, calls } = fakeFetch({
      "https://ex.it/download.php?id=3": { body: "disciplinare" },
      "https://ex.it/GetFile.aspx?doc=7": { body: "capitolato" },
    });
    const a = await fetchAttachment("https://ex.it/download.php?id=3", "Disciplinare di gara", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    const b = await fetchAttachment("https://ex.it/GetFile.aspx?doc=7", "", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(a.status).toBe("Downloaded");
    expect(a.localPath).toBe(join(dir, "Disciplinare di gara"));
    expect(b.status).toBe("Downloaded");
    expect(b.localPath).toBe(join(dir, "GetFile.aspx"));
    expect(calls).toEqual(["https://ex.it/download.php?id=3", "https://ex.it/GetFile.aspx?doc=7"]);
  });

  it("names files from the link and keeps the link's extension", async () => {
    const { impl } = fakeFetch({
      "https://ex.it/files/Capitolato%20tecnico.pdf": { body: "capitolato" },
      "https://ex.it/download/file.pdf": { body: "disciplinare" },
    });
    const a = await fetchAttachment("https://ex.it/files/Capitolato%20tecnico.pdf", "", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    const b = await fetchAttachment("https://ex.it/download/file.pdf", "Disciplinare", dir, {
      ...BASE,
      fetchImpl: impl,
    });
    expect(a.localPath).toBe(join(dir, "Capitolato tecnico.pdf"));
    expect(b.localPath).toBe(join(dir, "Disciplinare.pdf"));
  });
});
