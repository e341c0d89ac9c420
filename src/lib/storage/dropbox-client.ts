/**
 * Dropbox Storage Client
 * Folder listing, shared links and downloads over the Dropbox v2 HTTP API
 */

import { z } from 'zod';
import type { DropboxConfig } from '../config/env';
import { MalformedResponseError } from '../errors/newsletter-errors';
import { requestBytes, requestJson, type HttpErrorBody } from '../http/json-request';
import { logInfo } from '../observability/logger';
import type { StorageEntry, StorageService } from './types';

const API_BASE = 'https://api.dropboxapi.com/2';
const CONTENT_BASE = 'https://content.dropboxapi.com/2';

const EntrySchema = z.object({
  '.tag': z.enum(['file', 'folder', 'deleted']),
  name: z.string(),
  path_lower: z.string().optional(),
  path_display: z.string().optional(),
  id: z.string().optional(),
  size: z.number().optional(),
});

const ListFolderSchema = z.object({
  entries: z.array(EntrySchema),
  cursor: z.string(),
  has_more: z.boolean(),
});

const SharedLinkSchema = z.object({
  url: z.string().url(),
});

const ListSharedLinksSchema = z.object({
  links: z.array(SharedLinkSchema),
});

const AccountSchema = z.object({
  account_id: z.string(),
  email: z.string().optional(),
  name: z.object({ display_name: z.string() }).optional(),
});

export interface DropboxAccount {
  accountId: string;
  displayName?: string;
  email?: string;
}

/**
 * Rewrite a www.dropbox.com share link into a direct-download URL that
 * other services can fetch without following the preview page.
 */
export function toDirectDownloadUrl(shareUrl: string): string {
  return shareUrl.replace('dl=0', 'dl=1').replace('www.dropbox.com', 'dl.dropboxusercontent.com');
}

/**
 * Dropbox-API-Arg is an HTTP header, so non-ASCII characters must be \u escaped.
 */
export function encodeApiArg(arg: Record<string, unknown>): string {
  return JSON.stringify(arg).replace(
    /[\u007f-\uffff]/g,
    (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/** True when a Dropbox error_summary starts with the given error path. */
export function hasErrorTag(body: HttpErrorBody, tag: string): boolean {
  const parsed = z.object({ error_summary: z.string() }).safeParse(body.json);
  return parsed.success && parsed.data.error_summary.startsWith(tag);
}

function existingLinkFromConflict(body: HttpErrorBody): string | undefined {
  if (body.status !== 409) return undefined;
  const parsed = z
    .object({
      error: z.object({
        shared_link_already_exists: z
          .object({ metadata: SharedLinkSchema.optional() })
          .optional(),
      }),
    })
    .safeParse(body.json);
  return parsed.success ? parsed.data.error.shared_link_already_exists?.metadata?.url : undefined;
}

function toEntry(raw: z.infer<typeof EntrySchema>): StorageEntry {
  return {
    tag: raw['.tag'],
    name: raw.name,
    pathLower: raw.path_lower ?? raw.name.toLowerCase(),
    pathDisplay: raw.path_display ?? raw.name,
    id: raw.id,
    size: raw.size,
  };
}

export class DropboxClient implements StorageService {
  constructor(private readonly config: DropboxConfig) {}

  private jsonInit(body: unknown): RequestInit {
    return {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    };
  }

  /**
   * List every entry of a folder, following has_more pagination.
   */
  async listFolder(path: string): Promise<StorageEntry[]> {
    const entries: StorageEntry[] = [];

    let page = await requestJson(
      { service: 'dropbox', operation: 'files/list_folder', url: `${API_BASE}/files/list_folder` },
      this.jsonInit({ path, recursive: false, include_deleted: false, include_media_info: false }),
      ListFolderSchema
    );
    entries.push(...page.entries.map(toEntry));

    while (page.has_more) {
      page = await requestJson(
        {
          service: 'dropbox',
          operation: 'files/list_folder/continue',
          url: `${API_BASE}/files/list_folder/continue`,
        },
        this.jsonInit({ cursor: page.cursor }),
        ListFolderSchema
      );
      entries.push(...page.entries.map(toEntry));
    }

    return entries;
  }

  /**
   * Create (or reuse) a public shared link and return its direct-download form.
   */
  async createSharedLink(path: string): Promise<string> {
    const created = await requestJson(
      {
        service: 'dropbox',
        operation: 'sharing/create_shared_link_with_settings',
        url: `${API_BASE}/sharing/create_shared_link_with_settings`,
      },
      this.jsonInit({ path, settings: { requested_visibility: 'public' } }),
      SharedLinkSchema.nullable(),
      (body) => {
        if (!hasErrorTag(body, 'shared_link_already_exists')) return undefined;
        const url = existingLinkFromConflict(body);
        return url ? { url } : null;
      }
    );

    if (created) {
      return toDirectDownloadUrl(created.url);
    }

    logInfo('Shared link already exists, retrieving', { path });

    const existing = await requestJson(
      {
        service: 'dropbox',
        operation: 'sharing/list_shared_links',
        url: `${API_BASE}/sharing/list_shared_links`,
      },
      this.jsonInit({ path, direct_only: true }),
      ListSharedLinksSchema
    );

    const link = existing.links[0];
    if (!link) {
      throw new MalformedResponseError('dropbox', 'sharing/list_shared_links', `no link returned for ${path}`);
    }
    return toDirectDownloadUrl(link.url);
  }

  async download(path: string): Promise<Buffer> {
    return requestBytes(
      { service: 'dropbox', operation: 'files/download', url: `${CONTENT_BASE}/files/download` },
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          'Dropbox-API-Arg': encodeApiArg({ path }),
        },
      }
    );
  }

  async getCurrentAccount(): Promise<DropboxAccount> {
    const account = await requestJson(
      {
        service: 'dropbox',
        operation: 'users/get_current_account',
        url: `${API_BASE}/users/get_current_account`,
      },
      {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.accessToken}` },
      },
      AccountSchema
    );

    return {
      accountId: account.account_id,
      displayName: account.name?.display_name,
      email: account.email,
    };
  }
}
