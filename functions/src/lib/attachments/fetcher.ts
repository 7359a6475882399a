import * as logger from "firebase-functions/logger";
import { mkdir, open, rename, stat, unlink } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { TimeoutError, withTimeout } from "../tooling";
import type { DownloadStatus } from "../types";

export type FetchOptions = {
  allowedExtensions: readonly string[];
  maxBytes: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

export type FetchOutcome = {
  status: DownloadStatus;
  localPath: string | null;
  sizeBytes: number | null;
  error: string | null;
  /** A later attempt may succeed. */
  transient: boolean;
};

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

// server-side download endpoints; the link path says nothing about the file type
const SCRIPT_EXTENSIONS = new Set(["php", "asp", "aspx", "jsp", "do", "action", "cgi", "ashx"]);

const outcome = (
  status: DownloadStatus,
  error: string | null,
  localPath: string | null = null,
  sizeBytes: number | null = null
): FetchOutcome => ({ status, localPath, sizeBytes, error, transient: false });

const transientFailure = (error: string): FetchOutcome => ({
  ...outcome("Failed", error),
  transient: true,
});

const isTransientStatus = (status: number) =>
  status === 408 || status === 429 || status >= 500;

export function sanitizeFileName(name: string): string {
  let out = name
    .replace(/[<>:"\/\\|?*\u0000-\u001f]/g, "_")
    .replace(/^[.\s]+|[.\s]+$/g, "");
  if (out.length > 200) {
    const ext = extname(out);
    out = out.slice(0, 200 - ext.length) + ext;
  }
  return out || "attachment";
}

/** Lower-case extension without the dot, or null. */
export function fileExtension(name: string): string | null {
  const ext = extname(name).slice(1).toLowerCase();
  return ext && /^[a-z0-9]{1,8}$/.test(ext) ? ext : null;
}

function typeExtension(name: string) {
  const ext = fileExtension(name);
  return ext && !SCRIPT_EXTENSIONS.has(ext) ? ext : null;
}

function nameFromUrl(url: string) {
  try {
    return decodeURIComponent(basename(new URL(url).pathname));
  } catch {
    return "";
  }
}

async function existingSize(path: string): Promise<number> {
  try {
    const s = await stat(path);
    return s.isFile() ? s.size : 0;
  } catch {
    return 0;
  }
}

async function removeQuietly(path: string) {
  await unlink(path).catch((e: NodeJS.ErrnoException) => {
    if (e.code !== "ENOENT") throw e;
  });
}

/**
 * Downloads one attachment into `targetDir`. Failures come back as an
 * outcome; this never throws.
 */
export async function fetchAttachment(
  url: string,
  fileName: string,
  targetDir: string,
  opts: FetchOptions
): Promise<FetchOutcome> {
  const fromUrl = nameFromUrl(url);
  const ext = typeExtension(fileName) ?? typeExtension(fromUrl);
  const allowed = opts.allowedExtensions.map((e) => e.toLowerCase());
  if (ext && !allowed.includes(ext)) {
    return outcome("SkippedBadExtension", `Extension ${ext} not allowed`);
  }
  if (!/^https?:\/\//i.test(url)) return outcome("Failed", "Invalid URL");

  let safeName = sanitizeFileName(fileName || fromUrl);
  if (!fileExtension(safeName) && ext) safeName = `${safeName}.${ext}`;
  const dest = join(targetDir, safeName);

  const present = await existingSize(dest);
  if (present > 0) return outcome("Downloaded", null, dest, present);

  const part = `${dest}.part`;
  const doFetch = opts.fetchImpl ?? fetch;
  try {
    await mkdir(targetDir, { recursive: true });
    return await withTimeout(`download ${url}`, opts.timeoutMs, async (signal) => {
      const res = await doFetch(url, { signal, headers: { "User-Agent": USER_AGENT } });
      if (!res.ok) {
        await res.body?.cancel();
        const error = `HTTP error: ${res.status}`;
        return isTransientStatus(res.status) ? transientFailure(error) : outcome("Failed", error);
      }

      const declared = Number(res.headers.get("content-length") ?? NaN);
      if (Number.isFinite(declared) && declared > opts.maxBytes) {
        await res.body?.cancel();
        return outcome(
          "SkippedTooLarge",
          `File too large: ${(declared / 1024 / 1024).toFixed(1)} MB`
        );
      }
      if (!res.body) return outcome("Failed", "Empty response body");

      const reader = res.body.getReader();
      const fh = await open(part, "w");
      let total = 0;
      let tooLarge = false;
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          if (total + value.byteLength > opts.maxBytes) {
            tooLarge = true;
            await reader.cancel();
            break;
          }
          await fh.write(value);
          total += value.byteLength;
        }
      } finally {
        await fh.close();
      }

      if (tooLarge) {
        await removeQuietly(part);
        return outcome("SkippedTooLarge", "File size exceeded during download");
      }
      if (total === 0) {
        await removeQuietly(part);
        return outcome("Failed", "Empty response body");
      }
      await rename(part, dest);
      return outcome("Downloaded", null, dest, total);
    });
  } catch (e) {
    await removeQuietly(part).catch((err: unknown) =>
      logger.warn("could not remove partial download", { part, error: String(err) })
    );
    if (e instanceof TimeoutError) return transientFailure("Download timeout");
    return transientFailure(`Request error: ${e instanceof Error ? e.message : String(e)}`);
  }
}
