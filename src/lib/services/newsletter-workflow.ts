/**
 * Newsletter Workflow
 * Locate → Extract → Publish → Campaign, halting at the first failed step
 */

import { randomUUID } from 'node:crypto';
import type { CmsService } from '../cms/wix-client';
import type { AppConfig } from '../config/env';
import { locateDocuments, type LocatedDocuments } from '../documents/locator';
import { issueTitle, type MonthName } from '../documents/month';
import { summarizeCompanion, type SummaryResult } from '../documents/summary-extractor';
import type { CampaignService } from '../email/mailchimp-client';
import { loadCampaignTemplate } from '../email/renderer';
import { WorkflowStepError, type WorkflowStep } from '../errors/newsletter-errors';
import { withCorrelationId } from '../observability/logger';
import type { StorageService } from '../storage/types';
import { createDraftCampaign, type CampaignDraft } from './campaign-creator';
import { publishNewsletter, type PublishedNewsletter } from './link-publisher';

export type WorkflowState = WorkflowStep | 'done' | 'failed';

export interface WorkflowDeps {
  storage: StorageService;
  cms: CmsService;
  messaging: CampaignService;
  config: Pick<AppConfig, 'wix' | 'mailchimp' | 'layout'>;
}

export interface WorkflowOptions {
  month: MonthName;
  year: number;
  /** Stop after extraction without any remote writes */
  dryRun?: boolean;
  onStateChange?: (state: WorkflowState) => void;
}

export interface WorkflowResult {
  runId: string;
  month: MonthName;
  year: number;
  documents: LocatedDocuments;
  summary: SummaryResult;
  published?: PublishedNewsletter;
  campaign?: CampaignDraft;
}

export async function runNewsletterWorkflow(
  deps: WorkflowDeps,
  options: WorkflowOptions
): Promise<WorkflowResult> {
  const { storage, cms, messaging, config } = deps;
  const { month, year } = options;
  const runId = randomUUID();
  const log = withCorrelationId(runId);

  let current: WorkflowStep = 'locate';

  const enter = (step: WorkflowStep) => {
    current = step;
    log.info('Workflow step started', { step, month, year });
    options.onStateChange?.(step);
  };

  try {
    enter('locate');
    const documents = await locateDocuments(storage, month, year, config.layout);
    const template = await loadCampaignTemplate(config.layout.templatePath);

    enter('extract');
    const summary = await summarizeCompanion(storage, documents.companion, config.layout.summaryMaxLength);
    log.info('Summary ready', {
      kind: summary.kind,
      reason: summary.kind === 'defaulted' ? summary.reason : undefined,
    });

    if (options.dryRun) {
      log.info('Dry run, skipping publish and campaign');
      options.onStateChange?.('done');
      return { runId, month, year, documents, summary };
    }

    enter('publish');
    const published = await publishNewsletter(
      { storage, cms, wix: config.wix },
      { pdf: documents.pdf, title: issueTitle(month, year), summary: summary.text }
    );

    enter('campaign');
    const campaign = await createDraftCampaign(
      { messaging, mailchimp: config.mailchimp, template },
      { month, link: published.mediaUrl }
    );

    log.info('Workflow completed', {
      itemId: published.itemId,
      campaignId: campaign.id,
    });
    options.onStateChange?.('done');

    return { runId, month, year, documents, summary, published, campaign };
  } catch (error) {
    log.error('Workflow failed', {
      step: current,
      error: error instanceof Error ? { name: error.name, message: error.message } : String(error),
    });
    options.onStateChange?.('failed');
    throw new WorkflowStepError(current, error);
  }
}
