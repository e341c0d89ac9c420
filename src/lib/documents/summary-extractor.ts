/**
 * Summary Extractor
 * Best-effort meeting summary from the companion Word document.
 * Never throws: every failure becomes a `defaulted` result with its reason.
 */

import mammoth from 'mammoth';
import { logWarn } from '../observability/logger';
import type { StorageEntry, StorageService } from '../storage/types';

export const DEFAULT_SUMMARY = 'See newsletter for meeting details';

const KEYWORDS = ['meeting', 'speaker', 'program'];
const KEYWORD_WINDOW = 10;
const FALLBACK_WINDOW = 5;

export type SummaryResult =
  | { kind: 'extracted'; text: string }
  | { kind: 'defaulted'; text: string; reason: string };

export function defaulted(reason: string): SummaryResult {
  return { kind: 'defaulted', text: DEFAULT_SUMMARY, reason };
}

/** Split raw document text into trimmed, non-empty paragraphs. */
export function toParagraphs(rawText: string): string[] {
  return rawText
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter((line) => line.length > 0);
}

/** Cut at the last word boundary that fits, marking the cut with an ellipsis. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const slice = text.slice(0, maxLength - 1);
  const lastSpace = slice.lastIndexOf(' ');
  const cut = lastSpace > maxLength / 2 ? slice.slice(0, lastSpace) : slice;
  return `${cut.trimEnd()}…`;
}

/**
 * First keyword paragraph within the first ten, else the first paragraph
 * within the first five.
 */
export function selectSummary(paragraphs: string[], maxLength: number): SummaryResult {
  const keywordHit = paragraphs
    .slice(0, KEYWORD_WINDOW)
    .find((p) => KEYWORDS.some((keyword) => p.toLowerCase().includes(keyword)));

  const chosen = keywordHit ?? paragraphs.slice(0, FALLBACK_WINDOW)[0];

  if (!chosen) {
    return defaulted('document has no text');
  }
  return { kind: 'extracted', text: truncate(chosen, maxLength) };
}

/**
 * Extract a summary from .docx bytes. `undefined` means no companion document.
 */
export async function extractSummary(
  document: Buffer | undefined,
  maxLength: number
): Promise<SummaryResult> {
  if (!document) {
    return defaulted('no companion document');
  }

  try {
    const { value } = await mammoth.extractRawText({ buffer: document });
    return selectSummary(toParagraphs(value), maxLength);
  } catch (error) {
    const reason = `unreadable document: ${error instanceof Error ? error.message : String(error)}`;
    logWarn('Summary extraction failed, using default', { reason });
    return defaulted(reason);
  }
}

/**
 * Download the companion document (if any) and summarize it. A failed
 * download is one more reason to fall back to the default text.
 */
export async function summarizeCompanion(
  storage: StorageService,
  companion: StorageEntry | undefined,
  maxLength: number
): Promise<SummaryResult> {
  if (!companion) {
    return defaulted('no companion document');
  }

  let bytes: Buffer;
  try {
    bytes = await storage.download(companion.pathLower);
  } catch (error) {
    const reason = `download failed: ${error instanceof Error ? error.message : String(error)}`;
    logWarn('Companion document download failed, using default summary', {
      path: companion.pathDisplay,
      reason,
    });
    return defaulted(reason);
  }

  return extractSummary(bytes, maxLength);
}
