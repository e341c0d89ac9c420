import { isNewsletterError } from '../errors/newsletter-errors';
import type { CampaignDraft } from '../services/campaign-creator';
import type { WorkflowResult } from '../services/newsletter-workflow';

const RULE = '='.repeat(60);

export function formatCampaignLines(campaign: CampaignDraft): string[] {
  return [
    `📧 Draft campaign: ${campaign.title} (${campaign.id})`,
    `   Subject: ${campaign.subjectLine}`,
    `   Review:  ${campaign.reviewUrl}`,
  ];
}

export function formatWorkflowReport(result: WorkflowResult): string[] {
  const { documents, summary, published, campaign } = result;
  const lines = [
    RULE,
    published ? `✅ ${result.month} ${result.year} newsletter prepared` : `🔎 ${result.month} ${result.year} dry run`,
    RULE,
    `📄 PDF:       ${documents.pdf.pathDisplay}`,
    `📝 Companion: ${documents.companion?.pathDisplay ?? '(none)'}`,
    summary.kind === 'extracted'
      ? `   Summary:   ${summary.text}`
      : `   Summary:   ${summary.text} (default: ${summary.reason})`,
  ];

  if (published) {
    lines.push(
      `🔗 Share link: ${published.shareUrl}`,
      `🌐 Wix file:   ${published.mediaUrl}`,
      `🗂  CMS item:   ${published.title} (${published.itemId})`
    );
  }

  if (campaign) {
    lines.push(...formatCampaignLines(campaign), '', 'Review the draft in Mailchimp and send it from there when ready.');
  }

  return lines;
}

export function formatFailure(error: unknown): string {
  if (isNewsletterError(error)) {
    return `❌ ${error.message}`;
  }
  return `❌ Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}
