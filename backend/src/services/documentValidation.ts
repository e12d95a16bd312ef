import { promises as fs } from "node:fs";
import path from "node:path";
import { SUPPORTED_EXTENSIONS } from "../config.js";
import { ValidationResult } from "../types.js";
import { DocxDocument } from "./documentModel.js";

export function hasSupportedExtension(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filename).toLowerCase());
}

/**
 * Checks an uploaded file before it enters a session: it exists, has a
 * supported extension, fits the size limit, and opens as a document.
 */
export async function validateDocx(filePath: string, maxFileSizeBytes: number): Promise<ValidationResult> {
  let size: number;
  try {
    size = (await fs.stat(filePath)).size;
  } catch {
    return { valid: false, reason: "File not found." };
  }

  if (!hasSupportedExtension(filePath)) {
    return { valid: false, reason: `Invalid file type. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}` };
  }

  if (size > maxFileSizeBytes) {
    const maxMb = maxFileSizeBytes / (1024 * 1024);
    return { valid: false, reason: `File too large. Maximum size: ${maxMb}MB` };
  }

  try {
    await DocxDocument.open(filePath);
  } catch (error) {
    return {
      valid: false,
      reason: `Cannot read file: ${error instanceof Error ? error.message : String(error)}`
    };
  }

  return { valid: true, reason: "" };
}
