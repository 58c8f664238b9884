import * as cheerio from 'cheerio';
import { CheerioAPI } from 'cheerio';
import { normalizeWhitespace } from './text-analyzer';

const NON_CONTENT = 'script, style, noscript, template';

/**
 * Visible text under the first element matching `selector`. A space follows
 * every element so adjacent blocks never glue their words together.
 */
export function extractText($: CheerioAPI, selector = 'body'): string {
  const html = $(selector).first().html() ?? '';
  const $copy = cheerio.load(html, null, false);
  $copy(NON_CONTENT).remove();
  $copy('*').after(' ');
  return normalizeWhitespace($copy.root().text());
}
