/**
 * Tests for the Newsletter Workflow (Locate → Extract → Publish → Campaign)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import mammoth from 'mammoth';
import {
  runNewsletterWorkflow,
  type WorkflowDeps,
  type WorkflowOptions,
  type WorkflowState,
} from '../newsletter-workflow';
import { FakeCms, FakeMessaging, FakeStorage } from '../../__tests__/fakes';
import {
  AmbiguousDocumentError,
  DocumentNotFoundError,
  RemoteApiError,
  TemplateMissingError,
  WorkflowStepError,
} from '../../errors/newsletter-errors';

vi.mock('mammoth', () => ({
  default: { extractRawText: vi.fn() },
}));

const extractRawText = vi.mocked(mammoth.extractRawText);

const ROOT = '/Newsletter/Monthly Newsletters';
const NOVEMBER = `${ROOT}/2025 Newsletter/November`;
const COMPANION = `${NOVEMBER}/Ted's Thoughts Nov 25.docx`.toLowerCase();

function makeConfig(templatePath = 'templates/newsletter-template.html'): WorkflowDeps['config'] {
  return {
    wix: { apiKey: 'test-wix-key', siteId: 'site-123', collectionId: 'Newsletters' },
    mailchimp: { apiKey: 'test-key-us21', listId: 'list-1', fromName: 'Garden Club' },
    layout: {
      rootPath: ROOT,
      pdfSuffix: '_Web.pdf',
      companionMarker: 'ted',
      companionExtension: '.docx',
      summaryMaxLength: 280,
      templatePath,
    },
  };
}

describe('runNewsletterWorkflow', () => {
  let storage: FakeStorage;
  let cms: FakeCms;
  let messaging: FakeMessaging;
  let states: WorkflowState[];

  const run = (options: Partial<WorkflowOptions> = {}, config = makeConfig()) =>
    runNewsletterWorkflow(
      { storage, cms, messaging, config },
      {
        month: 'November',
        year: 2025,
        onStateChange: (state) => states.push(state),
        ...options,
      }
    );

  async function runExpectingFailure(
    options: Partial<WorkflowOptions> = {},
    config = makeConfig()
  ): Promise<WorkflowStepError> {
    try {
      await run(options, config);
    } catch (error) {
      if (error instanceof WorkflowStepError) return error;
      throw error;
    }
    throw new Error('expected the workflow to fail');
  }

  beforeEach(() => {
    storage = new FakeStorage()
      .addFolder(NOVEMBER, ['DMSC_2025_Nov_Web.pdf', "Ted's Thoughts Nov 25.docx"])
      .addFile(COMPANION, Buffer.from('docx'));
    cms = new FakeCms();
    messaging = new FakeMessaging();
    states = [];
    extractRawText.mockReset();
    extractRawText.mockResolvedValue({
      value: "Ted's Thoughts\n\nMonthly Meeting Thursday November 20 at 7 PM\n",
      messages: [],
    });
  });

  it('should run every step and return a draft campaign', async () => {
    const result = await run();

    expect(states).toEqual(['locate', 'extract', 'publish', 'campaign', 'done']);
    expect(result.documents.pdf.name).toBe('DMSC_2025_Nov_Web.pdf');
    expect(result.documents.companion?.name).toBe("Ted's Thoughts Nov 25.docx");
    expect(result.summary).toEqual({
      kind: 'extracted',
      text: 'Monthly Meeting Thursday November 20 at 7 PM',
    });
    expect(result.published?.title).toBe('November 2025');
    expect(cms.items[0]).toEqual({
      collectionId: 'Newsletters',
      data: {
        title: 'November 2025',
        newsletter: 'wix:document://v1/ugd/abc123_f1le/DMSC_2025_Nov_Web.pdf',
        newsletterSummary: 'Monthly Meeting Thursday November 20 at 7 PM',
      },
    });
    expect(result.campaign?.reviewUrl).toBe('https://us21.admin.mailchimp.com/campaigns/edit?id=4242');
    expect(result.campaign?.reviewUrl).toContain(String(result.campaign?.webId));
    expect(messaging.contents[0].html).toContain('href="https://site-123.usrfiles.com/ugd/abc123_f1le.pdf"');
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should use the default summary when there is no companion document', async () => {
    storage = new FakeStorage().addFolder(NOVEMBER, ['DMSC_2025_Nov_Web.pdf']);

    const result = await run();

    expect(result.summary).toEqual({
      kind: 'defaulted',
      text: 'See newsletter for meeting details',
      reason: 'no companion document',
    });
    expect(cms.items[0].data.newsletterSummary).toBe('See newsletter for meeting details');
    expect(result.campaign?.id).toBe('cmp-42');
  });

  it('should fail at locate without remote writes when the folder is absent', async () => {
    const error = await runExpectingFailure({ month: 'July' });

    expect(error.step).toBe('locate');
    expect(error.cause).toBeInstanceOf(DocumentNotFoundError);
    expect(error.message).toBe(`Failed at locate: Folder not found: ${ROOT}/2025 Newsletter/July`);
    expect(states).toEqual(['locate', 'failed']);
    expect(storage.calls).toEqual([`listFolder ${ROOT}/2025 Newsletter/July`]);
    expect(cms.imports).toEqual([]);
    expect(cms.items).toEqual([]);
    expect(messaging.created).toEqual([]);
  });

  it('should fail at locate when no PDF matches', async () => {
    storage = new FakeStorage().addFolder(NOVEMBER, ["Ted's Thoughts Nov 25.docx"]);

    const error = await runExpectingFailure();

    expect(error.step).toBe('locate');
    expect(error.cause).toMatchObject({ kind: 'DocumentNotFound', reason: 'no-match' });
    expect(storage.calls).toEqual([`listFolder ${NOVEMBER}`]);
    expect(cms.imports).toEqual([]);
    expect(messaging.created).toEqual([]);
  });

  it('should fail at locate when several PDFs match', async () => {
    storage = new FakeStorage().addFolder(NOVEMBER, ['DMSC_2025_Nov_Web.pdf', 'DMSC_2025_Nov_v2_Web.pdf']);

    const error = await runExpectingFailure();

    expect(error.step).toBe('locate');
    expect(error.cause).toBeInstanceOf(AmbiguousDocumentError);
    expect(cms.imports).toEqual([]);
  });

  it('should stop after extraction on a dry run', async () => {
    const result = await run({ dryRun: true });

    expect(states).toEqual(['locate', 'extract', 'done']);
    expect(result.summary.kind).toBe('extracted');
    expect(result.published).toBeUndefined();
    expect(result.campaign).toBeUndefined();
    expect(storage.calls).toEqual([`listFolder ${NOVEMBER}`, `download ${COMPANION}`]);
    expect(cms.imports).toEqual([]);
    expect(messaging.created).toEqual([]);
  });

  it('should fail at publish and skip the campaign', async () => {
    cms.failImport = new RemoteApiError('wix', 'media import', 401, 'Unauthorized');

    const error = await runExpectingFailure();

    expect(error.step).toBe('publish');
    expect(error.cause).toBe(cms.failImport);
    expect(states).toEqual(['locate', 'extract', 'publish', 'failed']);
    expect(messaging.created).toEqual([]);
  });

  it('should fail at locate without remote writes when the template is missing', async () => {
    const error = await runExpectingFailure({}, makeConfig('templates/missing-template.html'));

    expect(error.step).toBe('locate');
    expect(error.cause).toBeInstanceOf(TemplateMissingError);
    expect(states).toEqual(['locate', 'failed']);
    expect(storage.calls).toEqual([`listFolder ${NOVEMBER}`]);
    expect(cms.imports).toHaveLength(0);
    expect(cms.items).toHaveLength(0);
    expect(messaging.created).toEqual([]);
  });

  it('should check the template on a dry run too', async () => {
    const error = await runExpectingFailure({ dryRun: true }, makeConfig('templates/missing-template.html'));

    expect(error.step).toBe('locate');
    expect(error.cause).toBeInstanceOf(TemplateMissingError);
  });

  it('should fail at campaign when the content upload fails', async () => {
    messaging.failContent = new RemoteApiError('mailchimp', 'campaign cmp-42 content update', 400, 'Invalid Resource');

    const error = await runExpectingFailure();

    expect(error.step).toBe('campaign');
    expect(error.message).toBe(
      'Failed at campaign: mailchimp campaign cmp-42 content update failed (HTTP 400): Invalid Resource'
    );
  });
});
