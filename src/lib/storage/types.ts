export type StorageEntryTag = 'file' | 'folder' | 'deleted';

export interface StorageEntry {
  tag: StorageEntryTag;
  name: string;
  /** Lower-cased absolute path, as used for follow-up API calls */
  pathLower: string;
  pathDisplay: string;
  id?: string;
  size?: number;
}

/**
 * The storage operations the workflow needs. DropboxClient is the production
 * implementation; tests supply in-memory fakes.
 */
export interface StorageService {
  listFolder(path: string): Promise<StorageEntry[]>;
  /** Returns a publicly fetchable direct-download URL for the file */
  createSharedLink(path: string): Promise<string>;
  download(path: string): Promise<Buffer>;
}
