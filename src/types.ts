/**
 * ReadQueue Type Definitions
 */

// =============================================================================
// Source List Types (scraped from the reading tracker)
// =============================================================================

/**
 * One entry of a user's to-read list.
 * Identity is positional - the source exposes no stable ID.
 */
export interface SourceItem {
  readonly link: string | null;
  readonly title: string;
  readonly author: string;
}

// =============================================================================
// Library Manager Types
// =============================================================================

export const FORMATS = ['eBook', 'AudioBook'] as const;

/** Acquisition format - tracked independently by the library manager */
export type Format = typeof FORMATS[number];

export function isFormat(value: string): value is Format {
  return (FORMATS as readonly string[]).includes(value);
}

/**
 * Per-format state of a library record
 */
export interface FormatState {
  present: boolean;         // Already in the library
  statusText: string;       // Raw manager status ("Wanted", "Skipped", "Open", ...)
  libraryLabel: string;     // Location label, often a timestamp of when it was added
}

/**
 * A library-manager record, adapted from the manager's loose JSON
 */
export interface LibraryCandidate {
  id: string;
  title: string;
  author: string;
  formatStatuses: Record<Format, FormatState>;
}

// =============================================================================
// Reconciliation Types
// =============================================================================

export type StatusLetter = 'Have' | 'Wanted' | 'Skipped' | 'Ignored' | 'Missing';

export interface MatchResult {
  sourceItem: SourceItem;
  libraryMatches: LibraryCandidate[];   // Manager order, first is primary
  perFormatStatus: Partial<Record<Format, StatusLetter>>;
}

/**
 * A SourceItem whose library lookup failed and was degraded to Missing
 */
export interface ItemFailure {
  index: number;
  title: string;
  author: string;
  error: string;
}

export interface ReconcileOptions {
  formats?: readonly Format[];
  forceRefresh?: boolean;
  maxBooks?: number | null;
  signal?: AbortSignal;
}

export interface ReconcileReport {
  username: string;
  results: MatchResult[];
  totalChecked: number;
  fromCache: boolean;           // Reconciliation served without touching the manager
  fetchedAt: Date;              // When the results were computed
  sourceListFetchedAt: Date;
  sourceListStale: boolean;     // Fell back to a stale list after a retrieval failure
  failures: ItemFailure[];
}

// =============================================================================
// Cache Types
// =============================================================================

export type CacheKind = 'source-list' | 'reconciliation';

export interface CachePayloads {
  'source-list': SourceItem[];
  'reconciliation': MatchResult[];
}

export interface CacheEntry<K extends CacheKind = CacheKind> {
  payload: CachePayloads[K];
  fetchedAt: Date;
}

// =============================================================================
// Collaborator Contracts
// =============================================================================

export interface SourceListProvider {
  fetchSourceList(username: string, signal?: AbortSignal): Promise<SourceItem[]>;
}

export interface CandidateProvider {
  searchLibraryCandidates(title: string, author: string, signal?: AbortSignal): Promise<LibraryCandidate[]>;
  /** Drop any locally held catalog snapshot */
  invalidate?(): void;
}

export interface ActionResult {
  success: boolean;
  message: string;
}

export interface AcquisitionProvider {
  markWanted(id: string, format: Format): Promise<ActionResult>;
  forceSearch(id: string, format: Format): Promise<ActionResult>;
}
