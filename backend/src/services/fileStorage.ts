import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { getLogger } from "../logger.js";

const log = getLogger("storage");

const FALLBACK_NAME = "document.docx";

/** Strips path separators and anything but letters, digits, `._- ` from an upload name. */
export function sanitizeFilename(filename: string): string {
  const stripped = filename.replace(/[/\\\u0000]/g, "");
  const safe = Array.from(stripped)
    .filter((char) => /[A-Za-z0-9._\- ]/.test(char) || (char.charCodeAt(0) > 127 && /\p{L}/u.test(char)))
    .join("")
    .trim();

  const named = !safe || safe.startsWith(".") ? FALLBACK_NAME : safe;
  return named.toLowerCase().endsWith(".docx") ? named : `${named}.docx`;
}

export function buildStoredPath(storageDir: string, originalName: string): string {
  return path.join(storageDir, `${uuidv4()}_${sanitizeFilename(originalName)}`);
}

/** `report.docx` → `report_revisi.docx`, keeping the directory. */
export function revisionPath(filePath: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}_revisi${parsed.ext}`);
}

export function cleanOutputName(originalName: string): string {
  const parsed = path.parse(originalName);
  return `${parsed.name}_revisi${parsed.ext}`;
}

export async function ensureStorageDir(storageDir: string): Promise<void> {
  await fs.mkdir(storageDir, { recursive: true });
}

/** Deletes an artifact; a file that is already gone counts as removed. */
export async function removeArtifact(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    log.info("Deleted artifact", { filePath });
    return true;
  } catch (error) {
    const code = (error as { code?: string }).code;
    if (code === "ENOENT") {
      return false;
    }
    log.error("Failed to delete artifact", { filePath, error });
    return false;
  }
}
