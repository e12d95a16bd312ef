import { diffWords } from "diff";
import { Fix } from "../types.js";
import { DocxDocument } from "./documentModel.js";
import { locateOccurrences } from "./occurrenceLocator.js";

export type FixPreview = {
  fix: Fix;
  occurrences: Array<{
    index: number;
    containerIndex: number;
    sentence: string;
    proposedSentence: string;
    diffHtml: string;
  }>;
};

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

export function buildDiffHtml(originalText: string, proposedText: string): string {
  const parts = diffWords(originalText, proposedText);
  return parts
    .map((part) => {
      const safeValue = escapeHtml(part.value);
      if (part.added) {
        return `<span class="diff-added">${safeValue}</span>`;
      }
      if (part.removed) {
        return `<span class="diff-removed">${safeValue}</span>`;
      }
      return `<span>${safeValue}</span>`;
    })
    .join("");
}

/** What each sentence holding `fix.search` would read like after the fix. */
export function previewFix(document: DocxDocument, fix: Fix): FixPreview {
  return {
    fix,
    occurrences: locateOccurrences(document, fix.search).map((occurrence) => {
      const proposedSentence = occurrence.sentence.split(fix.search).join(fix.replace);
      return {
        index: occurrence.index,
        containerIndex: occurrence.containerIndex,
        sentence: occurrence.sentence,
        proposedSentence,
        diffHtml: buildDiffHtml(occurrence.sentence, proposedSentence)
      };
    })
  };
}
