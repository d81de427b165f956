// src/services/classifier.ts
// What: Pure predicates deciding which files the pipeline is allowed to touch.
// How: Book formats are matched on the last extension, case-insensitively. Catalog-internal artifacts
//      (library database, covers, OPF sidecars, Calibre's hidden folders) are never candidates.

import path from 'path';

export const DEFAULT_BOOK_FORMATS: readonly string[] = [
  'epub', 'pdf', 'mobi', 'azw', 'azw3', 'txt', 'rtf', 'doc', 'docx', 'html', 'htm',
  'lit', 'prc', 'pdb', 'fb2', 'djvu', 'djv', 'chm', 'tcr', 'ps', 'pml', 'rb', 'rtf2',
  'snb', 'txtz', 'zip', 'cbz', 'cb7', 'cbr', 'cbt',
];

const CATALOG_ARTIFACT_NAMES = new Set(['metadata.db', 'metadata_db_prefs_backup.json', 'cover.jpg']);
const CATALOG_INTERNAL_DIRS = new Set(['.calibre', '.caltrash', '.calnotes']);

/** Marker file Calibre writes into every per-book folder of a library. */
export const CATALOG_BOOK_MARKER = 'metadata.opf';

/** Lowercase extension without the dot; '' when the name has none. */
export function extensionOf(filename: string): string {
  return path.extname(filename).slice(1).toLowerCase();
}

export function isSupportedBook(filename: string, formats: ReadonlySet<string>): boolean {
  const ext = extensionOf(filename);
  return ext.length > 0 && formats.has(ext);
}

export function isCatalogArtifact(filename: string): boolean {
  const lower = filename.toLowerCase();
  return CATALOG_ARTIFACT_NAMES.has(lower) || lower.endsWith('.opf');
}

export function isCatalogInternalDir(name: string): boolean {
  return CATALOG_INTERNAL_DIRS.has(name.toLowerCase());
}

/** Normalizes a user-supplied list ("EPUB, .pdf") into a lookup set. */
export function toFormatSet(formats: readonly string[]): ReadonlySet<string> {
  return new Set(
    formats
      .map((f) => f.trim().toLowerCase().replace(/^\./, ''))
      .filter((f) => f.length > 0),
  );
}
