/**
 * Adapts LazyLibrarian book records into LibraryCandidate.
 * All field-name variants are resolved here so the matcher sees one shape.
 */

import type { FormatState, LibraryCandidate } from '../types.js';
import { isRecord, recordId, stringField, type LLRecord } from './lazyLibrarian.js';

const TITLE_KEYS = ['BookName', 'bookname', 'book_name', 'title', 'Title'];
const AUTHOR_KEYS = ['AuthorName', 'authorname', 'Author', 'author', 'author_name'];

function libraryField(record: LLRecord, ...keys: string[]): { present: boolean; label: string } {
  for (const key of keys) {
    const value = record[key];
    if (value === null || value === undefined || value === false || value === '') continue;
    if (typeof value === 'string' || typeof value === 'number') {
      return { present: true, label: String(value).trim() };
    }
    if (value === true) {
      return { present: true, label: '' };
    }
  }
  return { present: false, label: '' };
}

function formatState(record: LLRecord, statusKeys: string[], libraryKeys: string[]): FormatState {
  const library = libraryField(record, ...libraryKeys);
  return {
    present: library.present,
    statusText: stringField(record, ...statusKeys),
    libraryLabel: library.label,
  };
}

/**
 * Returns null for records without a title (nothing to compare against)
 */
export function toLibraryCandidate(record: unknown): LibraryCandidate | null {
  if (!isRecord(record)) return null;

  const title = stringField(record, ...TITLE_KEYS);
  if (!title) return null;

  return {
    id: recordId(record),
    title,
    author: stringField(record, ...AUTHOR_KEYS),
    formatStatuses: {
      eBook: formatState(record, ['Status', 'status'], ['BookLibrary', 'booklibrary', 'book_library']),
      AudioBook: formatState(record, ['AudioStatus', 'audiostatus', 'audio_status'], ['AudioLibrary', 'audiolibrary', 'audio_library']),
    },
  };
}

export function toLibraryCandidates(records: unknown[]): LibraryCandidate[] {
  const candidates: LibraryCandidate[] = [];
  for (const record of records) {
    const candidate = toLibraryCandidate(record);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}
