/**
 * Campaign Creator
 * Renders the newsletter announcement and leaves it as a draft campaign for review
 */

import type { MailchimpConfig } from '../config/env';
import type { CampaignService } from '../email/mailchimp-client';
import { renderCampaignHtml, type CampaignTemplate } from '../email/renderer';
import { logError, logInfo } from '../observability/logger';

export interface CampaignInput {
  month: string;
  link: string;
}

export interface CampaignDraft {
  id: string;
  webId: number;
  title: string;
  subjectLine: string;
  reviewUrl: string;
}

export interface CampaignCreatorDeps {
  messaging: CampaignService;
  mailchimp: Pick<MailchimpConfig, 'listId' | 'fromName' | 'replyTo'>;
  /** Loaded up front so a bad template path fails before any remote write */
  template: CampaignTemplate;
}

export function campaignSubject(fromName: string, month: string): string {
  return `${fromName} ${month} Newsletter is available!`;
}

export function campaignTitle(month: string): string {
  return `${month} Newsletter`;
}

export async function createDraftCampaign(
  deps: CampaignCreatorDeps,
  input: CampaignInput
): Promise<CampaignDraft> {
  const { messaging, mailchimp } = deps;

  const html = renderCampaignHtml(deps.template, input);
  logInfo('Rendered campaign template', { templatePath: deps.template.path, length: html.length });

  const title = campaignTitle(input.month);
  const subjectLine = campaignSubject(mailchimp.fromName, input.month);

  const campaign = await messaging.createCampaign(mailchimp.listId, {
    title,
    subjectLine,
    fromName: mailchimp.fromName,
    replyTo: mailchimp.replyTo,
  });
  logInfo('Created draft campaign', { campaignId: campaign.id, title });

  try {
    await messaging.setCampaignContent(campaign.id, html);
  } catch (error) {
    logError('Campaign was created but its content failed to upload', error, {
      campaignId: campaign.id,
    });
    throw error;
  }

  return {
    id: campaign.id,
    webId: campaign.webId,
    title,
    subjectLine,
    reviewUrl: messaging.reviewUrl(campaign.webId),
  };
}
