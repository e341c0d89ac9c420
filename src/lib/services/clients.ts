import { WixClient } from '../cms/wix-client';
import type { AppConfig } from '../config/env';
import { MailchimpClient } from '../email/mailchimp-client';
import { DropboxClient } from '../storage/dropbox-client';

export interface VendorClients {
  storage: DropboxClient;
  cms: WixClient;
  messaging: MailchimpClient;
}

export function createClients(config: AppConfig): VendorClients {
  return {
    storage: new DropboxClient(config.dropbox),
    cms: new WixClient(config.wix),
    messaging: new MailchimpClient(config.mailchimp),
  };
}
