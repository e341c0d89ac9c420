/**
 * Tests for the Wix CMS client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { WixClient } from '../wix-client';
import { MalformedResponseError } from '../../errors/newsletter-errors';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('WixClient', () => {
  let client: WixClient;
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    client = new WixClient({ apiKey: 'test-wix-key', siteId: 'site-123' });
    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  it('should import a file from a URL', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        file: {
          id: 'abc123_f1le.pdf',
          url: 'https://site-123.usrfiles.com/ugd/abc123_f1le.pdf',
          displayName: 'DMSC_2025_Nov_Web.pdf',
          operationStatus: 'PENDING',
        },
      })
    );

    const media = await client.importFile({
      url: 'https://dl.dropboxusercontent.com/s/file.pdf?dl=1',
      mimeType: 'application/pdf',
      displayName: 'DMSC_2025_Nov_Web.pdf',
    });

    expect(media).toEqual({
      id: 'abc123_f1le.pdf',
      url: 'https://site-123.usrfiles.com/ugd/abc123_f1le.pdf',
      displayName: 'DMSC_2025_Nov_Web.pdf',
    });
    expect(fetchMock).toHaveBeenCalledWith('https://www.wixapis.com/site-media/v1/files/import', {
      method: 'POST',
      headers: {
        Authorization: 'test-wix-key',
        'wix-site-id': 'site-123',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        url: 'https://dl.dropboxusercontent.com/s/file.pdf?dl=1',
        mimeType: 'application/pdf',
        displayName: 'DMSC_2025_Nov_Web.pdf',
      }),
    });
  });

  it('should reject an import response without a file id', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ file: { url: 'https://site-123.usrfiles.com/ugd/x.pdf' } }));

    await expect(
      client.importFile({ url: 'https://x', mimeType: 'application/pdf', displayName: 'x.pdf' })
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('should create a data item in a collection', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ dataItem: { id: 'item-9', dataCollectionId: 'Newsletters', data: { title: 'November 2025' } } })
    );

    const item = await client.createItem('Newsletters', { title: 'November 2025' });

    expect(item).toEqual({ id: 'item-9' });
    const init: RequestInit = fetchMock.mock.calls[0][1];
    expect(JSON.parse(String(init.body))).toEqual({
      dataCollectionId: 'Newsletters',
      dataItem: { data: { title: 'November 2025' } },
    });
  });

  it('should surface permission errors with their message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Insufficient permissions', details: {} }, 403));

    await expect(client.createItem('Newsletters', {})).rejects.toThrow(
      'wix data item create failed (HTTP 403): Insufficient permissions (permission denied; check the credential scopes)'
    );
  });

  it('should list collections', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ collections: [{ id: 'Newsletters', displayName: 'Newsletters' }, { id: 'Events' }] })
    );

    await expect(client.listCollections()).resolves.toEqual([
      { id: 'Newsletters', displayName: 'Newsletters' },
      { id: 'Events' },
    ]);
  });
});
