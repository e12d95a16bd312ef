import { TextContainer, containerText } from "./documentModel.js";

/** Non-overlapping occurrences of `needle`, scanning left to right. */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  let count = 0;
  let cursor = haystack.indexOf(needle);
  while (cursor !== -1) {
    count += 1;
    cursor = haystack.indexOf(needle, cursor + needle.length);
  }
  return count;
}

function replaceEvery(text: string, search: string, replace: string): string {
  return text.split(search).join(replace);
}

/**
 * Replaces matches that sit wholly inside one run. Run boundaries and
 * formatting are untouched. Returns the number of matches replaced.
 */
export function substituteWithinRuns(container: TextContainer, search: string, replace: string): number {
  if (!search) {
    return 0;
  }
  let replaced = 0;
  for (const run of container.runs) {
    const text = run.text;
    const count = countOccurrences(text, search);
    if (count > 0) {
      run.text = replaceEvery(text, search, replace);
      replaced += count;
    }
  }
  return replaced;
}

/**
 * Replaces matches in the container's concatenated text. When anything
 * changed, the first run takes the whole new text with its own formatting
 * and every other run is emptied.
 */
export function substituteAcrossRuns(container: TextContainer, search: string, replace: string): number {
  const runs = container.runs;
  if (!search || runs.length === 0) {
    return 0;
  }

  const combined = runs.map((run) => run.text).join("");
  const count = countOccurrences(combined, search);
  const updated = replaceEvery(combined, search, replace);
  if (count === 0 || updated === combined) {
    return 0;
  }

  runs.forEach((run, index) => {
    run.text = index === 0 ? updated : "";
  });
  return count;
}

/**
 * Format-preserving replacement inside one container. In-run matches are
 * replaced first; only when none exist and the match straddles a run
 * boundary does the container collapse to its first run's formatting.
 */
export function substitute(container: TextContainer, search: string, replace: string): number {
  if (!search) {
    return 0;
  }
  const handled = substituteWithinRuns(container, search, replace);
  if (handled > 0) {
    return handled;
  }
  if (!containerText(container).includes(search)) {
    return 0;
  }
  return substituteAcrossRuns(container, search, replace);
}
