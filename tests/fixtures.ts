/**
 * Shared test data builders
 */

import type { FormatState, LibraryCandidate, SourceItem } from '../src/types.js';

export function state(overrides: Partial<FormatState> = {}): FormatState {
  return { present: false, statusText: '', libraryLabel: '', ...overrides };
}

export function candidate(
  title: string,
  author: string,
  formats: { eBook?: Partial<FormatState>; AudioBook?: Partial<FormatState> } = {},
  id = `${title}-${author}`,
): LibraryCandidate {
  return {
    id,
    title,
    author,
    formatStatuses: {
      eBook: state(formats.eBook),
      AudioBook: state(formats.AudioBook),
    },
  };
}

export function item(title: string, author: string, link: string | null = null): SourceItem {
  return { link, title, author };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
