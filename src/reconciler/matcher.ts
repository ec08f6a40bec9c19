/**
 * Reconciliation Matcher
 * Decides which library records correspond to a to-read entry and derives
 * a per-format status from the manager's free-text status strings.
 */

import { FORMATS } from '../types.js';
import type { Format, FormatState, LibraryCandidate, MatchResult, SourceItem, StatusLetter } from '../types.js';
import { normalize } from './normalizer.js';

export interface StatusRule {
  letter: StatusLetter;
  patterns: string[];       // Case-insensitive substrings
}

/**
 * Substring rules applied in order, first hit wins.
 * Extend by appending; text matching no rule falls back to the presence flag.
 */
export const STATUS_RULES: readonly StatusRule[] = [
  { letter: 'Wanted', patterns: ['want', 'missing'] },
  { letter: 'Skipped', patterns: ['skip'] },
  { letter: 'Ignored', patterns: ['ignor'] },
  { letter: 'Have', patterns: ['avail', 'in library', 'have'] },
];

// Strongest first; used to pick one letter when several candidates disagree
const LETTER_PRECEDENCE: readonly StatusLetter[] = ['Have', 'Wanted', 'Skipped', 'Ignored', 'Missing'];

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Classify one status string. Unrecognized text is Have only when the
 * record is already present, otherwise Missing.
 */
export function classifyStatus(
  statusText: string,
  present: boolean,
  rules: readonly StatusRule[] = STATUS_RULES,
): StatusLetter {
  const text = statusText.toLowerCase();
  if (text) {
    for (const rule of rules) {
      if (rule.patterns.some(p => text.includes(p))) {
        return rule.letter;
      }
    }
  }
  return present ? 'Have' : 'Missing';
}

export function isTimestampLabel(label: string): boolean {
  return ISO_TIMESTAMP.test(label.trim());
}

/**
 * Library label fit for display. Timestamps are hidden (the raw record keeps them).
 */
export function displayLabel(state: FormatState): string | null {
  const label = state.libraryLabel.trim();
  if (!label || isTimestampLabel(label)) return null;
  return label;
}

/**
 * Exact tier: equal normalized title or equal normalized author.
 * Empty values never count as equal.
 */
export function isExactMatch(source: SourceItem, candidate: LibraryCandidate): boolean {
  const sourceTitle = normalize(source.title);
  const sourceAuthor = normalize(source.author);
  const titleMatch = sourceTitle !== '' && sourceTitle === normalize(candidate.title);
  const authorMatch = sourceAuthor !== '' && sourceAuthor === normalize(candidate.author);
  return titleMatch || authorMatch;
}

/**
 * Derive one format's letter across all matched candidates.
 *
 * Present candidates with status text are consulted first; otherwise any
 * candidate with status text. The strongest letter among them wins, so the
 * outcome does not depend on the order the manager returned them in.
 */
export function deriveFormatStatus(
  matches: LibraryCandidate[],
  format: Format,
  rules: readonly StatusRule[] = STATUS_RULES,
): StatusLetter {
  const states = matches.map(c => c.formatStatuses[format]);
  const anyPresent = states.some(s => s.present);
  const withText = states.filter(s => s.statusText.trim() !== '');

  if (!anyPresent && withText.length === 0) {
    return 'Missing';
  }

  const presentWithText = withText.filter(s => s.present);
  const pool = presentWithText.length > 0 ? presentWithText : withText;

  if (pool.length === 0) {
    return 'Have';
  }

  const letters = new Set(pool.map(s => classifyStatus(s.statusText.trim(), s.present, rules)));
  return LETTER_PRECEDENCE.find(letter => letters.has(letter)) ?? 'Missing';
}

/**
 * Match one to-read entry against the manager's candidates
 */
export function match(
  sourceItem: SourceItem,
  candidates: LibraryCandidate[],
  formats: readonly Format[] = FORMATS,
): MatchResult {
  const libraryMatches = candidates.filter(c => isExactMatch(sourceItem, c));

  const perFormatStatus: Partial<Record<Format, StatusLetter>> = {};
  for (const format of formats) {
    perFormatStatus[format] = libraryMatches.length > 0
      ? deriveFormatStatus(libraryMatches, format)
      : 'Missing';
  }

  return { sourceItem, libraryMatches, perFormatStatus };
}

/**
 * All-Missing result for an entry whose lookup failed
 */
export function missingResult(sourceItem: SourceItem, formats: readonly Format[] = FORMATS): MatchResult {
  return match(sourceItem, [], formats);
}
