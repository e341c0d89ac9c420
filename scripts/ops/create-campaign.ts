import 'dotenv/config';
import { parseCreateCampaignArgs, parseLink, prompt, resolveMonth } from '../../src/lib/cli/args';
import { formatCampaignLines, formatFailure } from '../../src/lib/cli/report';
import { loadConfig } from '../../src/lib/config/env';
import { MailchimpClient } from '../../src/lib/email/mailchimp-client';
import { loadCampaignTemplate } from '../../src/lib/email/renderer';
import { createDraftCampaign } from '../../src/lib/services/campaign-creator';

// Campaign only, for a newsletter that is already published
async function main() {
  try {
    const args = parseCreateCampaignArgs(process.argv.slice(2));
    const config = loadConfig();
    const template = await loadCampaignTemplate(config.layout.templatePath);
    const month = await resolveMonth(args.month);
    const link = args.link ?? parseLink(await prompt('Enter the published newsletter link: ', 'Link'));

    const campaign = await createDraftCampaign(
      {
        messaging: new MailchimpClient(config.mailchimp),
        mailchimp: config.mailchimp,
        template,
      },
      { month, link }
    );

    console.log(['✅ Draft campaign created', ...formatCampaignLines(campaign)].join('\n'));
  } catch (err) {
    console.error(formatFailure(err));
    process.exit(1);
  }
}

main();
