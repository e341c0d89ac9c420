/**
 * Mailchimp Marketing API Client
 * Campaign creation and content; the data center comes from the API key suffix
 */

import { z } from 'zod';
import type { MailchimpConfig } from '../config/env';
import { ConfigurationMissingError } from '../errors/newsletter-errors';
import { requestJson } from '../http/json-request';

const CampaignSchema = z.object({
  id: z.string().min(1),
  web_id: z.number().int(),
  status: z.string().optional(),
});

const ContentSchema = z.object({
  html: z.string().optional(),
});

const PingSchema = z.object({
  health_status: z.string(),
});

export interface CampaignSettings {
  subjectLine: string;
  title: string;
  fromName: string;
  replyTo?: string;
}

export interface CreatedCampaign {
  id: string;
  webId: number;
  status?: string;
}

/**
 * The messaging operations the workflow needs; MailchimpClient is the production one.
 */
export interface CampaignService {
  createCampaign(listId: string, settings: CampaignSettings): Promise<CreatedCampaign>;
  setCampaignContent(campaignId: string, html: string): Promise<void>;
  reviewUrl(webId: number): string;
}

/** "0123abcd-us21" → "us21" */
export function dataCenterFromKey(apiKey: string): string {
  const dash = apiKey.lastIndexOf('-');
  const dc = dash >= 0 ? apiKey.slice(dash + 1) : '';
  if (!/^[a-z]+\d+$/i.test(dc)) {
    throw new ConfigurationMissingError(
      ['MAILCHIMP_API_KEY'],
      'MAILCHIMP_API_KEY must end with its data center, e.g. "...-us21"'
    );
  }
  return dc;
}

export class MailchimpClient implements CampaignService {
  readonly dataCenter: string;
  private readonly baseUrl: string;

  constructor(private readonly config: Pick<MailchimpConfig, 'apiKey'>) {
    this.dataCenter = dataCenterFromKey(config.apiKey);
    this.baseUrl = `https://${this.dataCenter}.api.mailchimp.com/3.0`;
  }

  private headers(): Record<string, string> {
    const credentials = Buffer.from(`anystring:${this.config.apiKey}`).toString('base64');
    return {
      Authorization: `Basic ${credentials}`,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Create a regular campaign for the list. Mailchimp creates it in the
   * "save" (draft) state; nothing here sends or schedules it.
   */
  async createCampaign(listId: string, settings: CampaignSettings): Promise<CreatedCampaign> {
    const campaign = await requestJson(
      { service: 'mailchimp', operation: 'campaign create', url: `${this.baseUrl}/campaigns` },
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          type: 'regular',
          recipients: { list_id: listId },
          settings: {
            subject_line: settings.subjectLine,
            title: settings.title,
            from_name: settings.fromName,
            ...(settings.replyTo ? { reply_to: settings.replyTo } : {}),
          },
        }),
      },
      CampaignSchema
    );

    return { id: campaign.id, webId: campaign.web_id, status: campaign.status };
  }

  async setCampaignContent(campaignId: string, html: string): Promise<void> {
    await requestJson(
      {
        service: 'mailchimp',
        operation: `campaign ${campaignId} content update`,
        url: `${this.baseUrl}/campaigns/${encodeURIComponent(campaignId)}/content`,
      },
      { method: 'PUT', headers: this.headers(), body: JSON.stringify({ html }) },
      ContentSchema
    );
  }

  reviewUrl(webId: number): string {
    return `https://${this.dataCenter}.admin.mailchimp.com/campaigns/edit?id=${webId}`;
  }

  async ping(): Promise<string> {
    const result = await requestJson(
      { service: 'mailchimp', operation: 'ping', url: `${this.baseUrl}/ping` },
      { method: 'GET', headers: this.headers() },
      PingSchema
    );
    return result.health_status;
  }
}
