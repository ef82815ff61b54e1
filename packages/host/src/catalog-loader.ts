/**
 * tuneup host — Catalog Loader
 *
 * Reads a catalog directory:
 *
 *   <dir>/catalog.json   the resource document
 *   <dir>/files/...      source files referenced by FileCopy entries
 *
 * and hands both to parseCatalogDocument. A catalog that cannot be read or
 * parsed is unusable and the run must not start; a single missing source
 * file is not (the resource is reported as SourceMissing at plan time).
 */

import { readFileSync } from 'node:fs';
import { join, relative, resolve, isAbsolute } from 'node:path';
import { ReconcileError, ReconcileErrorCode, errorMessage, parseCatalogDocument } from '@tuneup/core';
import type { Catalog, SourceLoader, ValidationError } from '@tuneup/core';
import { isNodeError } from './state/state-io.js';

export const CATALOG_FILE = 'catalog.json';
export const SOURCES_DIR = 'files';

/** Thrown when the catalog document is structurally invalid. */
export class CatalogInvalidError extends Error {
  constructor(
    readonly dir: string,
    readonly errors: ReadonlyArray<ValidationError>,
  ) {
    super(`catalog ${join(dir, CATALOG_FILE)} is invalid (${errors.length} error${errors.length === 1 ? '' : 's'})`);
    this.name = 'CatalogInvalidError';
  }
}

/**
 * Source loader rooted at `<dir>/files`. Sources resolving outside that
 * directory are treated as missing.
 */
export function directorySourceLoader(dir: string): SourceLoader {
  const root = resolve(dir, SOURCES_DIR);
  return (source: string): Uint8Array | null => {
    const path = resolve(root, source);
    const rel = relative(root, path);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
    try {
      const buffer = readFileSync(path);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'EISDIR')) return null;
      throw err;
    }
  };
}

/**
 * Load and validate the catalog in `dir`.
 *
 * @throws {ReconcileError} SourceMissing when catalog.json is absent or not JSON
 * @throws {CatalogInvalidError} when the document fails validation
 */
export function loadCatalog(dir: string): Catalog {
  const file = join(dir, CATALOG_FILE);
  let doc: unknown;
  try {
    doc = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err: unknown) {
    const reason = isNodeError(err, 'ENOENT') ? 'not found' : errorMessage(err);
    throw new ReconcileError(ReconcileErrorCode.SourceMissing, `cannot read catalog ${file}: ${reason}`);
  }

  const result = parseCatalogDocument(doc, directorySourceLoader(dir));
  if (!result.ok) throw new CatalogInvalidError(dir, result.errors);
  return result.value;
}
