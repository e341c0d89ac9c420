/**
 * Campaign Template Renderer
 * Loads the local template, substitutes placeholders, compiles MJML templates to HTML
 */

import mjml2html from 'mjml';
import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { TemplateMissingError } from '../errors/newsletter-errors';
import { logError, logWarn } from '../observability/logger';

export const MONTH_PLACEHOLDER = '{{MONTH}}';
export const LINK_PLACEHOLDER = '{{WIX_LINK}}';

export interface CampaignTemplateData {
  month: string;
  link: string;
}

export interface CampaignTemplate {
  path: string;
  source: string;
}

export function resolveTemplatePath(templatePath: string): string {
  return isAbsolute(templatePath) ? templatePath : join(process.cwd(), templatePath);
}

/**
 * Load a template file from disk
 */
export async function loadTemplate(templatePath: string): Promise<string> {
  const fullPath = resolveTemplatePath(templatePath);

  try {
    return await readFile(fullPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new TemplateMissingError(fullPath);
    }
    logError('Failed to load email template', error, { templatePath: fullPath });
    throw error;
  }
}

/**
 * Literal replacement of every {{MONTH}} and {{WIX_LINK}} occurrence.
 */
export function renderTemplate(template: string, data: CampaignTemplateData): string {
  for (const placeholder of [MONTH_PLACEHOLDER, LINK_PLACEHOLDER]) {
    if (!template.includes(placeholder)) {
      logWarn('Template is missing a placeholder', { placeholder });
    }
  }

  // Single pass, so substituted values are never rescanned
  return template.replace(/{{(MONTH|WIX_LINK)}}/g, (_m, key: string) =>
    key === 'MONTH' ? data.month : data.link
  );
}

export function isMjmlTemplate(templatePath: string): boolean {
  return templatePath.toLowerCase().endsWith('.mjml');
}

/**
 * Compile MJML markup to email-ready HTML. Validation problems are logged,
 * not fatal, matching MJML's "soft" validation level.
 */
export function compileMjml(markup: string): string {
  const { html, errors } = mjml2html(markup, { validationLevel: 'soft' });

  if (errors.length > 0) {
    logWarn('MJML validation warnings', {
      count: errors.length,
      errors: errors.map((e) => e.formattedMessage),
    });
  }

  return html;
}

export async function loadCampaignTemplate(templatePath: string): Promise<CampaignTemplate> {
  return { path: templatePath, source: await loadTemplate(templatePath) };
}

/**
 * Substitute and (for .mjml files) compile the campaign body.
 */
export function renderCampaignHtml(template: CampaignTemplate, data: CampaignTemplateData): string {
  const rendered = renderTemplate(template.source, data);
  return isMjmlTemplate(template.path) ? compileMjml(rendered) : rendered;
}
