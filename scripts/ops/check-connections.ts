import 'dotenv/config';
import { formatFailure } from '../../src/lib/cli/report';
import { loadConfig } from '../../src/lib/config/env';
import { createClients } from '../../src/lib/services/clients';

// Read-only credential checks against each service
async function main() {
  try {
    const { storage, cms, messaging } = createClients(loadConfig());

    const checks: Array<[string, () => Promise<string>]> = [
      [
        'Dropbox',
        async () => {
          const account = await storage.getCurrentAccount();
          return account.displayName ?? account.accountId;
        },
      ],
      [
        'Wix',
        async () => {
          const collections = await cms.listCollections();
          return `${collections.length} collections`;
        },
      ],
      ['Mailchimp', () => messaging.ping()],
    ];

    let failures = 0;
    for (const [name, check] of checks) {
      try {
        console.log(`✅ ${name}: ${await check()}`);
      } catch (err) {
        failures += 1;
        console.error(`${formatFailure(err)} (${name})`);
      }
    }

    if (failures > 0) process.exit(1);
  } catch (err) {
    console.error(formatFailure(err));
    process.exit(1);
  }
}

main();
