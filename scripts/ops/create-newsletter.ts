import 'dotenv/config';
import { parseCreateNewsletterArgs, resolveMonth } from '../../src/lib/cli/args';
import { formatFailure, formatWorkflowReport } from '../../src/lib/cli/report';
import { loadConfig } from '../../src/lib/config/env';
import { createClients } from '../../src/lib/services/clients';
import { runNewsletterWorkflow } from '../../src/lib/services/newsletter-workflow';

async function main() {
  try {
    const args = parseCreateNewsletterArgs(process.argv.slice(2));
    const config = loadConfig();
    const month = await resolveMonth(args.month);
    const year = args.year ?? config.layout.year ?? new Date().getFullYear();

    const result = await runNewsletterWorkflow(
      { ...createClients(config), config },
      {
        month,
        year,
        dryRun: args.dryRun,
        onStateChange: (state) => {
          if (state !== 'done' && state !== 'failed') console.log(`▶ ${state}`);
        },
      }
    );

    console.log(formatWorkflowReport(result).join('\n'));
  } catch (err) {
    console.error(formatFailure(err));
    process.exit(1);
  }
}

main();
