import { getLogger } from "../logger.js";
import { Occurrence } from "../types.js";
import { DocxDocument } from "./documentModel.js";
import { countOccurrences } from "./runSubstitution.js";

const log = getLogger("occurrences");

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
const CONTEXT_RADIUS = 40;

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BOUNDARY);
}

/**
 * Every match of `search`, in container order, with its sentence as
 * context. A sentence holding two matches yields two occurrences.
 */
export function locateOccurrences(document: DocxDocument, search: string): Occurrence[] {
  const occurrences: Occurrence[] = [];
  if (!search) {
    return occurrences;
  }

  let nextIndex = 0;
  for (const container of document.containers) {
    const text = container.text;
    if (!text.includes(search)) {
      continue;
    }
    for (const sentence of splitSentences(text)) {
      const matches = countOccurrences(sentence, search);
      for (let i = 0; i < matches; i += 1) {
        occurrences.push({
          index: nextIndex,
          sentence: sentence.trim(),
          containerIndex: container.index
        });
        nextIndex += 1;
      }
    }
  }
  return occurrences;
}

export function countText(document: DocxDocument, search: string): number {
  return document.containers.reduce((total, container) => total + countOccurrences(container.text, search), 0);
}

export async function findOccurrences(filePath: string, search: string): Promise<Occurrence[]> {
  try {
    const document = await DocxDocument.open(filePath);
    return locateOccurrences(document, search);
  } catch (error) {
    log.error("Failed to locate occurrences", { filePath, error });
    return [];
  }
}

/** Shortens long sentences to a window around the first case-insensitive match. */
export function formatOccurrenceContext(sentence: string, search: string, maxLength = 100): string {
  if (sentence.length <= maxLength) {
    return sentence;
  }
  const position = sentence.toLowerCase().indexOf(search.toLowerCase());
  if (position === -1) {
    return `${sentence.slice(0, maxLength)}...`;
  }
  const start = Math.max(0, position - CONTEXT_RADIUS);
  const end = Math.min(sentence.length, position + search.length + CONTEXT_RADIUS);
  return `...${sentence.slice(start, end)}...`;
}
