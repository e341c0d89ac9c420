/**
 * Wix CMS Client
 * Media manager import and Wix Data items, authenticated with a site API key
 */

import { z } from 'zod';
import type { WixConfig } from '../config/env';
import { requestJson } from '../http/json-request';

const API_BASE = 'https://www.wixapis.com';

const ImportFileSchema = z.object({
  file: z.object({
    id: z.string().min(1),
    url: z.string().url(),
    displayName: z.string().optional(),
  }),
});

const DataItemSchema = z.object({
  dataItem: z.object({
    id: z.string().min(1),
    data: z.record(z.unknown()).optional(),
  }),
});

const CollectionsSchema = z.object({
  collections: z.array(
    z.object({
      id: z.string(),
      displayName: z.string().optional(),
    })
  ),
});

export interface ImportFileInput {
  url: string;
  mimeType: string;
  displayName: string;
}

export interface ImportedMedia {
  id: string;
  url: string;
  displayName: string;
}

export interface CreatedItem {
  id: string;
}

export interface WixCollection {
  id: string;
  displayName?: string;
}

/**
 * The CMS operations the workflow needs; WixClient is the production one.
 */
export interface CmsService {
  importFile(input: ImportFileInput): Promise<ImportedMedia>;
  createItem(collectionId: string, data: Record<string, unknown>): Promise<CreatedItem>;
}

export class WixClient implements CmsService {
  constructor(private readonly config: Pick<WixConfig, 'apiKey' | 'siteId'>) {}

  private headers(): Record<string, string> {
    return {
      Authorization: this.config.apiKey,
      'wix-site-id': this.config.siteId,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Have Wix fetch a file from a public URL into the site's media manager.
   */
  async importFile(input: ImportFileInput): Promise<ImportedMedia> {
    const result = await requestJson(
      { service: 'wix', operation: 'media import', url: `${API_BASE}/site-media/v1/files/import` },
      { method: 'POST', headers: this.headers(), body: JSON.stringify(input) },
      ImportFileSchema
    );

    return {
      id: result.file.id,
      url: result.file.url,
      displayName: result.file.displayName ?? input.displayName,
    };
  }

  async createItem(collectionId: string, data: Record<string, unknown>): Promise<CreatedItem> {
    const result = await requestJson(
      { service: 'wix', operation: 'data item create', url: `${API_BASE}/wix-data/v2/items` },
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ dataCollectionId: collectionId, dataItem: { data } }),
      },
      DataItemSchema
    );

    return { id: result.dataItem.id };
  }

  async listCollections(): Promise<WixCollection[]> {
    const result = await requestJson(
      { service: 'wix', operation: 'collections list', url: `${API_BASE}/wix-data/v2/collections` },
      { method: 'GET', headers: this.headers() },
      CollectionsSchema
    );

    return result.collections;
  }
}
