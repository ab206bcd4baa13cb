// src/features/spatial/indicator-locator.ts
import type { DuplicateSnippet, IndicatorLocation, LocatorResult, MissingSnippet, Snippet } from "./types.js";
import { normalizeText } from "./normalizer.js";
import { IndicatorOutOfRangeError, SnippetNotFoundError } from "./errors.js";

export interface LocatorOptions {
  /** false skips the last snippet (legacy runs never looked it up). */
  includeLastSnippet?: boolean;
  /** 'error' throws on the first unusable snippet; 'skip' records it in `missing`. */
  onMissing?: "error" | "skip";
}

/** Wrap raw cell values as snippets, normalized the same way as the text. */
export function toSnippets(values: readonly string[]): Snippet[] {
  return values.map((raw, index) => ({ index, raw, text: normalizeText(raw) }));
}

/**
 * Find each snippet's first occurrence and derive the indicator offset that
 * follows it (snippet start + snippet length + 1, skipping the separating space).
 * Results keep snippet input order.
 */
export function locateIndicators(
  text: string,
  snippets: readonly Snippet[],
  opts: LocatorOptions = {}
): LocatorResult {
  const includeLast = opts.includeLastSnippet ?? true;
  const onMissing = opts.onMissing ?? "error";
  const considered = includeLast ? snippets : snippets.slice(0, -1);

  const locations: IndicatorLocation[] = [];
  const missing: MissingSnippet[] = [];
  const duplicates: DuplicateSnippet[] = [];
  const firstAtOffset = new Map<number, number>();

  for (const s of considered) {
    const snippetOffset = s.text.length > 0 ? text.indexOf(s.text) : -1;
    if (snippetOffset < 0) {
      if (onMissing === "error") throw new SnippetNotFoundError(s.index, s.text);
      missing.push({ snippetIndex: s.index, snippet: s.text, reason: "not-found" });
      continue;
    }

    const offset = snippetOffset + s.text.length + 1;
    if (offset >= text.length) {
      if (onMissing === "error") throw new IndicatorOutOfRangeError(s.index, s.text, offset, text.length);
      missing.push({ snippetIndex: s.index, snippet: s.text, reason: "past-end" });
      continue;
    }

    const earlier = firstAtOffset.get(snippetOffset);
    if (earlier === undefined) {
      firstAtOffset.set(snippetOffset, s.index);
    } else {
      duplicates.push({ snippetIndex: s.index, firstIndex: earlier, snippetOffset });
    }

    locations.push({
      snippetIndex: s.index,
      snippet: s.text,
      snippetOffset,
      snippetLength: s.text.length,
      offset,
      word: wordAt(text, offset),
    });
  }

  return { locations, missing, duplicates };
}

/** Token starting at offset, up to the next space or end of text. */
export function wordAt(text: string, offset: number): string {
  const end = text.indexOf(" ", offset);
  return text.slice(offset, end === -1 ? text.length : end);
}
