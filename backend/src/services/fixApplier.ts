import { getLogger } from "../logger.js";
import { ApplyResult, Fix, FixOutcome, ReplaceResult } from "../types.js";
import { DocxDocument } from "./documentModel.js";
import { revisionPath } from "./fileStorage.js";
import { substitute } from "./runSubstitution.js";

const log = getLogger("fixes");

export function isWellFormedFix(fix: Fix): boolean {
  return fix.search.length > 0 && fix.search !== fix.replace;
}

/**
 * Applies each fix against every container, in order, without stopping on
 * misses. Malformed fixes never touch the document.
 */
export function applyFixesToDocument(document: DocxDocument, fixes: Fix[]): FixOutcome[] {
  return fixes.map((fix): FixOutcome => {
    if (!isWellFormedFix(fix)) {
      return { fix, status: "malformed", replacements: 0 };
    }
    let replacements = 0;
    for (const container of document.containers) {
      replacements += substitute(container, fix.search, fix.replace);
    }
    return {
      fix,
      status: replacements > 0 ? "applied" : "not_found",
      replacements
    };
  });
}

function unchangedResult(fixes: Fix[], outcomes: FixOutcome[], status: "unchanged" | "failed", error?: string): ApplyResult {
  return {
    status,
    artifactPath: null,
    appliedCount: 0,
    skippedCount: fixes.length,
    applied: [],
    skipped: [...fixes],
    outcomes,
    ...(error ? { error } : {})
  };
}

/**
 * Applies a batch of fixes to the artifact at `filePath`. A new artifact
 * `{base}_revisi{ext}` is written only when at least one fix applied;
 * failures leave the input untouched and report every fix as skipped.
 */
export async function applyAllFixes(filePath: string, fixes: Fix[]): Promise<ApplyResult> {
  if (fixes.length === 0) {
    return unchangedResult(fixes, [], "unchanged");
  }

  try {
    const document = await DocxDocument.open(filePath);
    const outcomes = applyFixesToDocument(document, fixes);
    const applied = outcomes.filter((outcome) => outcome.status === "applied").map((outcome) => outcome.fix);
    if (applied.length === 0) {
      return unchangedResult(fixes, outcomes, "unchanged");
    }

    const skipped = outcomes.filter((outcome) => outcome.status !== "applied").map((outcome) => outcome.fix);
    const artifactPath = revisionPath(filePath);
    await document.save(artifactPath);
    log.info("Applied fixes", {
      applied: applied.length,
      skipped: skipped.length,
      artifactPath
    });

    return {
      status: "changed",
      artifactPath,
      appliedCount: applied.length,
      skippedCount: skipped.length,
      applied,
      skipped,
      outcomes
    };
  } catch (error) {
    log.error("Error applying fixes", { filePath, error });
    return unchangedResult(
      fixes,
      fixes.map((fix): FixOutcome => ({ fix, status: "failed", replacements: 0 })),
      "failed",
      error instanceof Error ? error.message : String(error)
    );
  }
}

/** Single find & replace over the whole document. */
export async function replaceText(filePath: string, search: string, replace: string): Promise<ReplaceResult> {
  if (!isWellFormedFix({ search, replace })) {
    return { status: "unchanged", artifactPath: null, replacements: 0 };
  }

  try {
    const document = await DocxDocument.open(filePath);
    let replacements = 0;
    for (const container of document.containers) {
      replacements += substitute(container, search, replace);
    }
    if (replacements === 0) {
      return { status: "unchanged", artifactPath: null, replacements: 0 };
    }

    const artifactPath = revisionPath(filePath);
    await document.save(artifactPath);
    log.info("Replaced text", { replacements, artifactPath });
    return { status: "changed", artifactPath, replacements };
  } catch (error) {
    log.error("Error replacing text", { filePath, error });
    return {
      status: "failed",
      artifactPath: null,
      replacements: 0,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}

export async function readDocumentText(filePath: string): Promise<string> {
  try {
    const document = await DocxDocument.open(filePath);
    return document.fullText();
  } catch (error) {
    log.error("Error reading document", { filePath, error });
    return "";
  }
}
