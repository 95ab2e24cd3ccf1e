import { DEFAULT_CONFIG, type ExtractionOptions } from "../config";
import { createDocumentId, formatDocumentId, sameCommunity, tryParseDocumentId, type DocumentId } from "../ids";

// Full-form cross references as printed on the sheet, e.g. "003-04".
const FULL_FORM_PATTERN = /\b(0\d{2}-\d{2})\b/g;

// Bare sheet numbers on the map border, e.g. "07" or a zero-padded "007".
// The sequence half of a full-form ID ("04" in "003-04") is not bare.
const SHORT_NUMERAL_PATTERN = /(?<!\d-)\b0?(\d{2})\b/g;

/**
 * Collects the IDs of neighbouring sheets referenced by a plat map.
 *
 * Plat sheets print their neighbours either in full (`001-12`) or, more
 * often, as a bare number inside a circle on the border (`12`). Bare
 * numbers are read as sequences within `selfId`'s community and kept only
 * inside `[shortNumeralMin, shortNumeralMax]`; larger numbers are lot or
 * parcel labels. When both passes together produce fewer than
 * `fallbackThreshold` candidates, the sheets at `fallbackOffsets` from
 * `selfId` are added as guesses.
 *
 * The result never contains `selfId`, never leaves its community and is
 * sorted by sequence.
 */
export function extractReferences(
  pageTexts: readonly string[],
  selfId: DocumentId,
  options: ExtractionOptions = DEFAULT_CONFIG.extraction,
): string[] {
  const text = pageTexts.join(" ");
  const selfKey = formatDocumentId(selfId);
  const candidates = new Map<string, DocumentId>();

  const collect = (target: Map<string, DocumentId>, candidate: DocumentId | undefined): void => {
    if (!candidate) {
      return;
    }
    const key = formatDocumentId(candidate);
    if (key !== selfKey) {
      target.set(key, candidate);
    }
  };

  for (const match of text.matchAll(FULL_FORM_PATTERN)) {
    collect(candidates, tryParseDocumentId(match[1]));
  }

  for (const match of text.matchAll(SHORT_NUMERAL_PATTERN)) {
    const sequence = Number.parseInt(match[1], 10);
    if (sequence >= Math.max(1, options.shortNumeralMin) && sequence <= options.shortNumeralMax) {
      collect(candidates, createDocumentId(selfId.community, sequence));
    }
  }

  const references = new Map<string, DocumentId>();
  for (const candidate of candidates.values()) {
    if (sameCommunity(candidate, selfId)) {
      collect(references, candidate);
    }
  }

  if (candidates.size < options.fallbackThreshold) {
    for (const offset of neighbourOffsets(selfId, options)) {
      collect(references, createDocumentId(selfId.community, selfId.sequence + offset));
    }
  }

  return [...references.values()].sort((a, b) => a.sequence - b.sequence).map(formatDocumentId);
}

/** Offsets from `selfId` that stay inside the configured sequence bounds. */
export function neighbourOffsets(selfId: DocumentId, options: ExtractionOptions): number[] {
  return options.fallbackOffsets.filter((offset) => {
    const sequence = selfId.sequence + offset;
    return sequence >= Math.max(1, options.sequenceMin) && sequence <= options.sequenceMax;
  });
}
