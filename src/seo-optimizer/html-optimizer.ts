import * as cheerio from 'cheerio';
import { CheerioAPI } from 'cheerio';
import { escape, uniqBy, upperFirst } from 'lodash';
import { extractText } from '../utils/html-text';
import {
  charLength,
  clipToWindow,
  clipToWord,
  fitToWindow,
  isWithinWindow,
} from '../utils/length-window';
import {
  calculateKeywordDensity,
  containsKeyword,
  countWords,
  extractTopic,
  normalizeWhitespace,
  roundDensity,
  slugify,
  splitSentences,
  stripTerminalPunctuation,
  toTitleCase,
} from '../utils/text-analyzer';
import {
  OptimizationRequest,
  OptimizationResult,
  OptimizerSettings,
} from './optimization.interface';
import { calculateScore, classifyLink, collectPageSignals } from './score-rules';
import {
  HEADING_TEMPLATES,
  INTERNAL_LINKS_TO_ADD,
  KEYWORD_DENSITY_BAND,
  KEYWORD_SENTENCES,
  MAX_KEYWORD_INSERTIONS,
  META_FILLERS,
  META_WINDOW,
  MIN_H2_HEADINGS,
  SECTION_PARAGRAPHS,
  SchemaType,
  TITLE_FILLERS,
  TITLE_WINDOW,
  callToAction,
} from './seo-optimizer.constants';

const DOCUMENT_SKELETON = [
  '<!DOCTYPE html>',
  '<html lang="en">',
  '<head>',
  '<meta charset="UTF-8">',
  '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
  '<title></title>',
  '</head>',
  '<body></body>',
  '</html>',
].join('\n');

const DESCRIPTION_SELECTOR = 'meta[name="description"]';
const CANONICAL_SELECTOR = 'link[rel="canonical"]';
const SCHEMA_SELECTOR = 'script[type="application/ld+json"]';

// Everything the assembled head regenerates. Fragments may carry these inside the body.
const HEAD_METADATA_SELECTOR = [
  'title',
  DESCRIPTION_SELECTOR,
  CANONICAL_SELECTOR,
  SCHEMA_SELECTOR,
  'meta[charset]',
  'meta[name="viewport"]',
  'meta[name="keywords"]',
  'meta[property^="og:"]',
  'meta[property^="article:"]',
].join(', ');

const NON_CONTENT_BLOCKS = 'h1, h2, h3, h4, h5, h6, script, style, noscript, template';

const TITLE_SEPARATOR = ' - ';

interface PassContext {
  $: CheerioAPI;
  keyword: string;
  settings: OptimizerSettings;
  applied: string[];
}

interface ExistingMetadata {
  title: string;
  headingText: string;
  description: string;
  canonicalUrl?: string;
  schemaBlocks: string[];
  hasOpenGraph: boolean;
}

interface SchemaInput {
  schemaType: SchemaType;
  title: string;
  description: string;
  keywords: string[];
  categories: readonly string[];
  wordCount: number;
  canonicalUrl: string;
  image?: string;
  settings: OptimizerSettings;
}

interface DocumentParts {
  title: string;
  description: string;
  keywords: string[];
  canonicalUrl: string;
  image?: string;
  siteName: string;
  categories: readonly string[];
  tags: readonly string[];
  schemaBlocks: string[];
  headNodes: string[];
  bodyHtml: string;
}

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`;

/**
 * Rewrites an HTML fragment around a focus keyword and returns the assembled
 * document together with its recomputed score. The prior score is only echoed
 * back; the new score is measured on the returned document.
 */
export function optimizeHtml(
  request: OptimizationRequest,
  settings: OptimizerSettings,
): OptimizationResult {
  const keyword = normalizeWhitespace(request.focusKeyword);
  const $ = cheerio.load(request.htmlFragment);
  const context: PassContext = { $, keyword, settings, applied: [] };

  const existing = readExistingMetadata($);
  const title = resolveTitle(context, existing);
  const description = resolveMetaDescription(context, existing);
  $(HEAD_METADATA_SELECTOR).remove();
  // Stylesheets, styles and other head nodes are carried over untouched.
  const headNodes = $('head')
    .children()
    .toArray()
    .map((node) => $.html(node));

  ensureH1(context, title);
  addSecondaryHeadings(context);
  addLinks(context);
  addImageAltText(context);
  adjustKeywordDensity(context);

  const canonicalUrl = existing.canonicalUrl ?? `${settings.siteUrl}/${slugify(keyword)}/`;
  if (!existing.canonicalUrl) context.applied.push('Added canonical URL');
  if (!existing.hasOpenGraph) context.applied.push('Added Open Graph meta tags');

  const keywords = uniqBy(
    [keyword, ...request.tags.map(normalizeWhitespace)].filter(Boolean),
    (entry) => entry.toLowerCase(),
  );
  const schemaBlocks = [...existing.schemaBlocks];
  if (schemaBlocks.length === 0) {
    schemaBlocks.push(
      buildSchemaMarkup({
        schemaType: request.schemaType,
        title,
        description,
        keywords,
        categories: request.categories,
        wordCount: countWords(extractText($, 'body')),
        canonicalUrl,
        image: request.image,
        settings,
      }),
    );
    context.applied.push(`Added ${request.schemaType} schema markup`);
  }

  const rewrittenHtml = assembleDocument({
    title,
    description,
    keywords,
    canonicalUrl,
    image: request.image,
    siteName: settings.siteName,
    categories: request.categories,
    tags: request.tags,
    schemaBlocks,
    headNodes,
    bodyHtml: $('body').html() ?? '',
  });

  const signals = collectPageSignals(cheerio.load(rewrittenHtml), keyword, settings.siteUrl);
  const scoreAfter = calculateScore(signals);

  return Object.freeze({
    scoreBefore: request.priorScore,
    scoreAfter,
    improvement: scoreAfter - request.priorScore,
    rewrittenHtml,
    keywordDensity: roundDensity(signals.keywordDensity),
    titleLength: charLength(signals.title),
    metaLength: charLength(signals.metaDescription),
    optimizationsApplied: Object.freeze([...context.applied]),
  });
}

function readExistingMetadata($: CheerioAPI): ExistingMetadata {
  const canonicalUrl = $(CANONICAL_SELECTOR).first().attr('href')?.trim();
  return {
    title: normalizeWhitespace($('title').first().text()),
    headingText: normalizeWhitespace($('h1').first().text()),
    description: normalizeWhitespace($(DESCRIPTION_SELECTOR).first().attr('content') ?? ''),
    canonicalUrl: canonicalUrl || undefined,
    schemaBlocks: $(SCHEMA_SELECTOR)
      .toArray()
      .map((script) => $(script).text().trim())
      .filter(isJsonDocument),
    hasOpenGraph: $('meta[property="og:title"]').length > 0,
  };
}

function isJsonDocument(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function bodySentences($: CheerioAPI): string[] {
  const paragraphs = $('body p')
    .toArray()
    .map((paragraph) => normalizeWhitespace($(paragraph).text()))
    .filter(Boolean);
  return splitSentences(paragraphs.length > 0 ? paragraphs.join(' ') : extractText($, 'body'));
}

function resolveTitle({ $, keyword, applied }: PassContext, existing: ExistingMetadata): string {
  if (existing.title && isWithinWindow(existing.title, TITLE_WINDOW)) return existing.title;

  const source = existing.title || existing.headingText;
  let title: string;
  if (!source) {
    const [firstSentence] = bodySentences($);
    const lead = firstSentence ? stripTerminalPunctuation(firstSentence) : '';
    const base = lead ? `${keyword}${TITLE_SEPARATOR}${lead}` : keyword;
    title = fitToWindow(base, TITLE_WINDOW, TITLE_FILLERS, TITLE_SEPARATOR);
  } else if (isWithinWindow(source, TITLE_WINDOW)) {
    title = source;
  } else if (charLength(source) > TITLE_WINDOW.max) {
    const base = containsKeyword(source, keyword) ? source : `${keyword}${TITLE_SEPARATOR}${source}`;
    title = clipToWindow(base, TITLE_WINDOW);
  } else {
    const base = containsKeyword(source, keyword) ? source : `${source}${TITLE_SEPARATOR}${keyword}`;
    title = fitToWindow(base, TITLE_WINDOW, TITLE_FILLERS, TITLE_SEPARATOR);
  }

  applied.push(
    existing.title
      ? `Optimized title tag length (${charLength(title)} characters)`
      : `Added title tag (${charLength(title)} characters)`,
  );
  return title;
}

function resolveMetaDescription(
  { $, keyword, applied }: PassContext,
  existing: ExistingMetadata,
): string {
  if (existing.description && isWithinWindow(existing.description, META_WINDOW)) {
    return existing.description;
  }

  // The call to action always survives; the lead gives way.
  const suffix = callToAction(keyword);
  const lead = bodySentences($).slice(0, 2).join(' ');
  const clippedLead = clipToWord(lead, META_WINDOW.max - charLength(suffix) - 1);
  const base = clippedLead ? `${clippedLead} ${suffix}` : suffix;
  const description = fitToWindow(base, META_WINDOW, META_FILLERS);

  applied.push(
    existing.description
      ? `Optimized meta description length (${charLength(description)} characters)`
      : `Added meta description (${charLength(description)} characters)`,
  );
  return description;
}

function ensureH1({ $, applied }: PassContext, title: string): void {
  if ($('body h1').length > 0) return;
  $('body').prepend(`<h1>${escape(title)}</h1>`);
  applied.push('Added H1 heading');
}

/**
 * Brings the body up to the minimum H2 count. Headings go before existing
 * content blocks at even intervals and are named after the block's opening
 * sentence; any still missing are appended as keyword sections.
 */
function addSecondaryHeadings({ $, keyword, applied }: PassContext): void {
  const existingHeadings = $('body h2').toArray();
  const missing = MIN_H2_HEADINGS - existingHeadings.length;
  if (missing <= 0) return;

  const taken = new Set(
    existingHeadings.map((heading) => normalizeWhitespace($(heading).text()).toLowerCase()),
  );
  const headingKeyword = toTitleCase(keyword);
  let templateIndex = 0;
  const nextTemplateIndex = (): number => {
    while (
      templateIndex < HEADING_TEMPLATES.length &&
      taken.has(HEADING_TEMPLATES[templateIndex](headingKeyword).toLowerCase())
    ) {
      templateIndex++;
    }
    return templateIndex++;
  };
  const templateHeading = (index: number): string =>
    index < HEADING_TEMPLATES.length
      ? HEADING_TEMPLATES[index](headingKeyword)
      : `More on ${headingKeyword}, Part ${index - HEADING_TEMPLATES.length + 2}`;

  const blocks = $('body').children().not(NON_CONTENT_BLOCKS).toArray();
  const placed = Math.min(missing, blocks.length);
  for (let slot = 0; slot < placed; slot++) {
    const block = blocks[Math.floor((slot * blocks.length) / placed)];
    const [firstSentence = ''] = splitSentences($(block).text());
    const topic = extractTopic(firstSentence);
    const heading =
      topic && !taken.has(topic.toLowerCase()) ? topic : templateHeading(nextTemplateIndex());
    taken.add(heading.toLowerCase());
    $(block).before(`<h2>${escape(heading)}</h2>`);
  }

  for (let slot = placed; slot < missing; slot++) {
    const index = nextTemplateIndex();
    const heading = templateHeading(index);
    const paragraph = upperFirst(SECTION_PARAGRAPHS[index % SECTION_PARAGRAPHS.length](keyword));
    taken.add(heading.toLowerCase());
    $('body').append(`<h2>${escape(heading)}</h2><p>${escape(paragraph)}</p>`);
  }

  applied.push(`Added ${plural(missing, 'H2 heading')}`);
}

function lastParagraph($: CheerioAPI) {
  if ($('body p').length === 0) $('body').append('<p></p>');
  return $('body p').last();
}

const internalAnchor = (text: string) => `<a href="/${slugify(text)}/">${escape(text)}</a>`;

function addLinks(context: PassContext): void {
  const { $, settings } = context;
  const kinds = $('body a[href]')
    .toArray()
    .map((anchor) => classifyLink($(anchor).attr('href') ?? '', settings.siteUrl));
  if (!kinds.includes('internal')) addInternalLinks(context);
  if (!kinds.includes('external')) addAuthorityLink(context);
}

function addInternalLinks({ $, keyword, applied }: PassContext): void {
  const used = new Set<string>();
  let added = 0;

  const unlinkedParagraphs = $('body p')
    .filter((_, paragraph) => $(paragraph).find('a').length === 0)
    .toArray();
  for (const paragraph of unlinkedParagraphs) {
    if (added >= INTERNAL_LINKS_TO_ADD) break;
    const [firstSentence = ''] = splitSentences($(paragraph).text());
    const topic = extractTopic(firstSentence);
    if (!topic || used.has(slugify(topic))) continue;
    used.add(slugify(topic));
    $(paragraph).append(` Read more in our guide to ${internalAnchor(topic)}.`);
    added++;
  }

  for (const phrase of [`${keyword} guide`, `${keyword} best practices`, `${keyword} checklist`]) {
    if (added >= INTERNAL_LINKS_TO_ADD) break;
    if (used.has(slugify(phrase))) continue;
    used.add(slugify(phrase));
    lastParagraph($).append(` See also our ${internalAnchor(phrase)}.`);
    added++;
  }

  applied.push(`Added ${plural(added, 'internal link')}`);
}

function addAuthorityLink({ $, settings, applied }: PassContext): void {
  const anchor =
    `<a href="${escape(settings.authorityLinkUrl)}" target="_blank" rel="noopener noreferrer">` +
    `${escape(settings.authorityLinkLabel)}</a>`;
  lastParagraph($).append(` For more background, see ${anchor}.`);
  applied.push('Added external authority link');
}

function describeImage(title: string | undefined, src: string | undefined): string | null {
  const fromTitle = normalizeWhitespace(title ?? '');
  if (fromTitle) return fromTitle;
  if (!src || src.startsWith('data:')) return null;

  const fileName = src.split(/[?#]/)[0].split('/').pop() ?? '';
  const words = fileName
    .replace(/\.[a-z0-9]+$/i, '')
    .split(/[-_\s.]+/)
    .filter((word) => /\p{L}/u.test(word));
  return words.length > 0 ? words.join(' ').toLowerCase() : null;
}

function addImageAltText({ $, keyword, applied }: PassContext): void {
  const images = $('body img')
    .filter((_, image) => !normalizeWhitespace($(image).attr('alt') ?? ''))
    .toArray();
  if (images.length === 0) return;

  images.forEach((image, index) => {
    const description = describeImage($(image).attr('title'), $(image).attr('src'));
    $(image).attr(
      'alt',
      description ? `${keyword} - ${description}` : `${keyword} illustration ${index + 1}`,
    );
  });
  applied.push(`Added alt text to ${plural(images.length, 'image')}`);
}

/**
 * Raises density toward the band by appending keyword sentences to paragraph
 * ends, cycling through paragraphs. Never removes text, so a density above the
 * band is left alone.
 */
function adjustKeywordDensity({ $, keyword, applied }: PassContext): void {
  const measure = () => calculateKeywordDensity(extractText($, 'body'), keyword);
  let density = measure();
  let insertions = 0;

  while (density < KEYWORD_DENSITY_BAND.min && insertions < MAX_KEYWORD_INSERTIONS) {
    const sentence = upperFirst(KEYWORD_SENTENCES[insertions % KEYWORD_SENTENCES.length](keyword));
    const paragraphs = $('body p');
    if (paragraphs.length === 0) {
      $('body').append(`<p>${escape(sentence)}</p>`);
    } else {
      paragraphs.eq(insertions % paragraphs.length).append(` ${escape(sentence)}`);
    }
    insertions++;
    density = measure();
  }

  if (insertions > 0) {
    applied.push(
      `Added ${plural(insertions, 'keyword mention')} (density ${density.toFixed(2)}%)`,
    );
  }
}

function buildSchemaMarkup(input: SchemaInput): string {
  const schema: Record<string, unknown> = {
    '@context': 'https://schema.org',
    '@type': input.schemaType,
    headline: input.title,
    description: input.description,
    keywords: input.keywords.join(', '),
    articleSection: input.categories.join(', '),
    wordCount: input.wordCount,
    inLanguage: 'en',
    mainEntityOfPage: { '@type': 'WebPage', '@id': input.canonicalUrl },
    author: { '@type': 'Person', name: input.settings.authorName },
    publisher: { '@type': 'Organization', name: input.settings.siteName },
  };
  if (input.image) schema.image = input.image;
  // A literal "</script>" inside a string value would end the script element.
  return JSON.stringify(schema, null, 2).replace(/</g, '\\u003c');
}

function assembleDocument(parts: DocumentParts): string {
  const $doc = cheerio.load(DOCUMENT_SKELETON);
  const head = $doc('head');
  const appendMeta = (attributes: Record<string, string>) => {
    head.append($doc('<meta>').attr(attributes));
  };

  $doc('title').text(parts.title);
  appendMeta({ name: 'description', content: parts.description });
  appendMeta({ name: 'keywords', content: parts.keywords.join(', ') });
  head.append($doc('<link>').attr({ rel: 'canonical', href: parts.canonicalUrl }));

  appendMeta({ property: 'og:type', content: 'article' });
  appendMeta({ property: 'og:title', content: parts.title });
  appendMeta({ property: 'og:description', content: parts.description });
  appendMeta({ property: 'og:url', content: parts.canonicalUrl });
  appendMeta({ property: 'og:site_name', content: parts.siteName });
  if (parts.image) appendMeta({ property: 'og:image', content: parts.image });
  parts.categories.forEach((category) =>
    appendMeta({ property: 'article:section', content: category }),
  );
  parts.tags.forEach((tag) => appendMeta({ property: 'article:tag', content: tag }));

  for (const block of parts.schemaBlocks) {
    head.append($doc('<script type="application/ld+json"></script>').text(block));
  }
  if (parts.headNodes.length > 0) head.append(parts.headNodes.join('\n'));

  $doc('body').html(parts.bodyHtml);
  return $doc.html();
}
