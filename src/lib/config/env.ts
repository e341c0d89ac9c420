/**
 * Environment Configuration
 * Validates process environment into an explicit config object handed to each client
 */

import { z } from 'zod';
import { ConfigurationMissingError } from '../errors/newsletter-errors';

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v === '' ? undefined : v))
  .optional();

const EnvSchema = z.object({
  DROPBOX_ACCESS_TOKEN: required('DROPBOX_ACCESS_TOKEN'),
  WIX_API_KEY: required('WIX_API_KEY'),
  WIX_SITE_ID: required('WIX_SITE_ID'),
  MAILCHIMP_API_KEY: required('MAILCHIMP_API_KEY'),
  MAILCHIMP_LIST_ID: required('MAILCHIMP_LIST_ID'),
  MAILCHIMP_FROM_NAME: required('MAILCHIMP_FROM_NAME'),

  WIX_COLLECTION_ID: z.string().trim().min(1).default('Newsletters'),
  WIX_PUBLIC_FILES_BASE: optionalString.pipe(z.string().url().optional()),
  MAILCHIMP_REPLY_TO: optionalString.pipe(z.string().email().optional()),

  NEWSLETTER_ROOT_PATH: z.string().trim().min(1).default('/Newsletter/Monthly Newsletters'),
  NEWSLETTER_PDF_SUFFIX: z.string().trim().min(1).default('_Web.pdf'),
  NEWSLETTER_COMPANION_MARKER: z.string().trim().min(1).default('ted'),
  NEWSLETTER_COMPANION_EXTENSION: z.string().trim().min(1).default('.docx'),
  NEWSLETTER_SUMMARY_MAX_LENGTH: z.coerce.number().int().min(20).max(2000).default(280),
  NEWSLETTER_TEMPLATE_PATH: z.string().trim().min(1).default('templates/newsletter-template.html'),
  NEWSLETTER_YEAR: optionalString.pipe(z.coerce.number().int().min(2000).max(2100).optional()),
});

export interface DropboxConfig {
  accessToken: string;
}

export interface WixConfig {
  apiKey: string;
  siteId: string;
  collectionId: string;
  publicFilesBase?: string;
}

export interface MailchimpConfig {
  apiKey: string;
  listId: string;
  fromName: string;
  replyTo?: string;
}

export interface LayoutConfig {
  rootPath: string;
  pdfSuffix: string;
  companionMarker: string;
  companionExtension: string;
  summaryMaxLength: number;
  templatePath: string;
  year?: number;
}

export interface AppConfig {
  dropbox: DropboxConfig;
  wix: WixConfig;
  mailchimp: MailchimpConfig;
  layout: LayoutConfig;
}

/**
 * Load configuration from an environment map (defaults to process.env).
 * Throws ConfigurationMissingError listing every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const variables = Array.from(new Set(parsed.error.issues.map((issue) => String(issue.path[0]))));
    throw new ConfigurationMissingError(variables);
  }

  const e = parsed.data;

  return {
    dropbox: {
      accessToken: e.DROPBOX_ACCESS_TOKEN,
    },
    wix: {
      apiKey: e.WIX_API_KEY,
      siteId: e.WIX_SITE_ID,
      collectionId: e.WIX_COLLECTION_ID,
      publicFilesBase: e.WIX_PUBLIC_FILES_BASE,
    },
    mailchimp: {
      apiKey: e.MAILCHIMP_API_KEY,
      listId: e.MAILCHIMP_LIST_ID,
      fromName: e.MAILCHIMP_FROM_NAME,
      replyTo: e.MAILCHIMP_REPLY_TO,
    },
    layout: {
      rootPath: e.NEWSLETTER_ROOT_PATH,
      pdfSuffix: e.NEWSLETTER_PDF_SUFFIX,
      companionMarker: e.NEWSLETTER_COMPANION_MARKER,
      companionExtension: e.NEWSLETTER_COMPANION_EXTENSION,
      summaryMaxLength: e.NEWSLETTER_SUMMARY_MAX_LENGTH,
      templatePath: e.NEWSLETTER_TEMPLATE_PATH,
      year: e.NEWSLETTER_YEAR,
    },
  };
}
