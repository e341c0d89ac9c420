/**
 * Document Locator
 * Finds the month's newsletter PDF and optional companion document in storage
 */

import {
  AmbiguousDocumentError,
  DocumentNotFoundError,
  RemoteApiError,
} from '../errors/newsletter-errors';
import { logInfo, logWarn } from '../observability/logger';
import type { StorageEntry, StorageService } from '../storage/types';
import type { MonthName } from './month';

export interface LocatorOptions {
  rootPath: string;
  pdfSuffix: string;
  companionMarker: string;
  companionExtension: string;
}

export interface MonthlyFolderRef {
  month: MonthName;
  year: number;
  folderPath: string;
}

export interface LocatedDocuments {
  folder: MonthlyFolderRef;
  pdf: StorageEntry;
  companion?: StorageEntry;
}

/** e.g. /Newsletter/Monthly Newsletters/2025 Newsletter/November */
export function monthFolderPath(rootPath: string, month: MonthName, year: number): string {
  const root = rootPath.replace(/\/+$/, '');
  return `${root}/${year} Newsletter/${month}`;
}

export function isNewsletterPdf(name: string, suffix: string): boolean {
  return name.toLowerCase().endsWith(suffix.toLowerCase());
}

export function isCompanionDocument(name: string, marker: string, extension: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes(marker.toLowerCase()) && lower.endsWith(extension.toLowerCase());
}

function isFolderMissing(error: unknown): boolean {
  return (
    error instanceof RemoteApiError &&
    error.service === 'dropbox' &&
    error.status === 409 &&
    error.detail.startsWith('path/not_found')
  );
}

/**
 * List the month folder and pick exactly one PDF plus, when present, one
 * companion document.
 */
export async function locateDocuments(
  storage: StorageService,
  month: MonthName,
  year: number,
  options: LocatorOptions
): Promise<LocatedDocuments> {
  const folderPath = monthFolderPath(options.rootPath, month, year);
  const folder: MonthlyFolderRef = { month, year, folderPath };

  logInfo('Looking for newsletter documents', { folderPath });

  let entries: StorageEntry[];
  try {
    entries = await storage.listFolder(folderPath);
  } catch (error) {
    if (isFolderMissing(error)) {
      throw new DocumentNotFoundError(folderPath, 'folder-missing');
    }
    throw error;
  }

  const files = entries.filter((entry) => entry.tag === 'file');

  const pdfs = files.filter((file) => isNewsletterPdf(file.name, options.pdfSuffix));
  if (pdfs.length === 0) {
    throw new DocumentNotFoundError(folderPath, 'no-match');
  }
  if (pdfs.length > 1) {
    throw new AmbiguousDocumentError(
      folderPath,
      pdfs.map((pdf) => pdf.name)
    );
  }
  const [pdf] = pdfs;

  const companions = files
    .filter((file) => isCompanionDocument(file.name, options.companionMarker, options.companionExtension))
    .sort((a, b) => a.name.localeCompare(b.name));

  if (companions.length > 1) {
    logWarn('Several companion documents found, using the first', {
      folderPath,
      candidates: companions.map((c) => c.name),
    });
  }
  const companion = companions[0];

  logInfo('Located newsletter documents', {
    pdf: pdf.name,
    companion: companion?.name ?? null,
  });

  return { folder, pdf, companion };
}
