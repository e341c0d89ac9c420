/**
 * Link Publisher
 * Shares the newsletter PDF from storage, imports it into the Wix media
 * manager and records it in the newsletters collection
 */

import type { CmsService } from '../cms/wix-client';
import type { WixConfig } from '../config/env';
import type { StorageEntry, StorageService } from '../storage/types';
import { logInfo } from '../observability/logger';

export interface PublishInput {
  pdf: StorageEntry;
  title: string;
  summary: string;
}

export interface PublishedNewsletter {
  title: string;
  summary: string;
  shareUrl: string;
  mediaFileId: string;
  /** Public URL of the imported PDF, used as the link in the email */
  mediaUrl: string;
  /** Wix document URI stored in the CMS record */
  documentRef: string;
  itemId: string;
}

export interface LinkPublisherDeps {
  storage: StorageService;
  cms: CmsService;
  wix: Pick<WixConfig, 'siteId' | 'collectionId' | 'publicFilesBase'>;
}

export function documentRef(fileId: string, displayName: string): string {
  return `wix:document://v1/ugd/${fileId}/${displayName}`;
}

/**
 * Swap the site's GUID file host for its public files base, when configured.
 */
export function toPublicMediaUrl(url: string, siteId: string, publicFilesBase?: string): string {
  if (!publicFilesBase) return url;
  const siteHost = `https://${siteId}.usrfiles.com/ugd/`;
  if (!url.startsWith(siteHost)) return url;
  const base = publicFilesBase.endsWith('/') ? publicFilesBase : `${publicFilesBase}/`;
  return `${base}${url.slice(siteHost.length)}`;
}

export async function publishNewsletter(
  deps: LinkPublisherDeps,
  input: PublishInput
): Promise<PublishedNewsletter> {
  const { storage, cms, wix } = deps;

  const shareUrl = await storage.createSharedLink(input.pdf.pathLower);
  logInfo('Created shared link', { path: input.pdf.pathDisplay });

  const media = await cms.importFile({
    url: shareUrl,
    mimeType: 'application/pdf',
    displayName: input.pdf.name,
  });
  const mediaUrl = toPublicMediaUrl(media.url, wix.siteId, wix.publicFilesBase);
  logInfo('Imported newsletter into media manager', { fileId: media.id, mediaUrl });

  const ref = documentRef(media.id, media.displayName);
  const item = await cms.createItem(wix.collectionId, {
    title: input.title,
    newsletter: ref,
    newsletterSummary: input.summary,
  });
  logInfo('Created CMS record', { itemId: item.id, collectionId: wix.collectionId, title: input.title });

  return {
    title: input.title,
    summary: input.summary,
    shareUrl,
    mediaFileId: media.id,
    mediaUrl,
    documentRef: ref,
    itemId: item.id,
  };
}
