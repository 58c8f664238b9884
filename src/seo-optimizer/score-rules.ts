import { CheerioAPI } from 'cheerio';
import { extractText } from '../utils/html-text';
import { isWithinWindow } from '../utils/length-window';
import {
  calculateKeywordDensity,
  containsKeyword,
  normalizeWhitespace,
} from '../utils/text-analyzer';
import {
  KEYWORD_DENSITY_BAND,
  META_WINDOW,
  MIN_H2_HEADINGS,
  TITLE_WINDOW,
} from './seo-optimizer.constants';

export type ScoreRuleKind =
  | 'titleInRange'
  | 'keywordInTitle'
  | 'metaInRange'
  | 'keywordInMeta'
  | 'h1Present'
  | 'keywordInH1'
  | 'h2Headings'
  | 'keywordDensityInRange'
  | 'internalLinks'
  | 'externalLink'
  | 'imageAltText'
  | 'schemaMarkup'
  | 'canonicalUrl';

export interface ScoreRule {
  kind: ScoreRuleKind;
  points: number;
  /** Rules scored per item award `points` for each item up to this count. */
  maxItems?: number;
}

export interface PageSignals {
  title: string;
  metaDescription: string;
  keywordInTitle: boolean;
  keywordInMeta: boolean;
  h1Count: number;
  keywordInH1: boolean;
  h2Count: number;
  keywordDensity: number;
  internalLinkCount: number;
  externalLinkCount: number;
  imagesMissingAlt: number;
  schemaBlockCount: number;
  hasCanonical: boolean;
}

export type LinkKind = 'internal' | 'external' | 'other';

export const SCORE_RULES: readonly ScoreRule[] = Object.freeze([
  { kind: 'titleInRange', points: 5 },
  { kind: 'keywordInTitle', points: 10 },
  { kind: 'metaInRange', points: 5 },
  { kind: 'keywordInMeta', points: 5 },
  { kind: 'h1Present', points: 5 },
  { kind: 'keywordInH1', points: 5 },
  { kind: 'h2Headings', points: 5, maxItems: MIN_H2_HEADINGS },
  { kind: 'keywordDensityInRange', points: 10 },
  { kind: 'internalLinks', points: 10 },
  { kind: 'externalLink', points: 5 },
  { kind: 'imageAltText', points: 10 },
  { kind: 'schemaMarkup', points: 10 },
  { kind: 'canonicalUrl', points: 5 },
] satisfies ScoreRule[]);

const MAX_SCORE = 100;

function satisfiedItems(kind: ScoreRuleKind, signals: PageSignals): number {
  switch (kind) {
    case 'titleInRange':
      return Number(signals.title !== '' && isWithinWindow(signals.title, TITLE_WINDOW));
    case 'keywordInTitle':
      return Number(signals.keywordInTitle);
    case 'metaInRange':
      return Number(
        signals.metaDescription !== '' && isWithinWindow(signals.metaDescription, META_WINDOW),
      );
    case 'keywordInMeta':
      return Number(signals.keywordInMeta);
    case 'h1Present':
      return Number(signals.h1Count > 0);
    case 'keywordInH1':
      return Number(signals.keywordInH1);
    case 'h2Headings':
      return signals.h2Count;
    case 'keywordDensityInRange':
      return Number(
        signals.keywordDensity >= KEYWORD_DENSITY_BAND.min &&
          signals.keywordDensity <= KEYWORD_DENSITY_BAND.max,
      );
    case 'internalLinks':
      return Number(signals.internalLinkCount > 0);
    case 'externalLink':
      return Number(signals.externalLinkCount > 0);
    case 'imageAltText':
      return Number(signals.imagesMissingAlt === 0);
    case 'schemaMarkup':
      return Number(signals.schemaBlockCount > 0);
    case 'canonicalUrl':
      return Number(signals.hasCanonical);
  }
}

export function calculateScore(
  signals: PageSignals,
  rules: readonly ScoreRule[] = SCORE_RULES,
): number {
  const total = rules.reduce((sum, rule) => {
    const items = Math.min(satisfiedItems(rule.kind, signals), rule.maxItems ?? 1);
    return sum + rule.points * items;
  }, 0);
  return Math.max(0, Math.min(MAX_SCORE, total));
}

export function classifyLink(href: string, siteUrl: string): LinkKind {
  const target = href.trim();
  if (!target || target.startsWith('#') || /^(mailto|tel|javascript):/i.test(target)) {
    return 'other';
  }
  try {
    const site = new URL(siteUrl);
    const resolved = new URL(target, site);
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return 'other';
    return resolved.hostname === site.hostname ? 'internal' : 'external';
  } catch {
    return 'other';
  }
}

export function collectPageSignals(
  $: CheerioAPI,
  keyword: string,
  siteUrl: string,
): PageSignals {
  const title = normalizeWhitespace($('title').first().text());
  const metaDescription = normalizeWhitespace(
    $('meta[name="description"]').first().attr('content') ?? '',
  );
  const h1Texts = $('body h1')
    .toArray()
    .map((heading) => normalizeWhitespace($(heading).text()));
  const linkKinds = $('body a[href]')
    .toArray()
    .map((anchor) => classifyLink($(anchor).attr('href') ?? '', siteUrl));
  const imagesMissingAlt = $('body img').filter(
    (_, image) => !normalizeWhitespace($(image).attr('alt') ?? ''),
  ).length;

  return {
    title,
    metaDescription,
    keywordInTitle: containsKeyword(title, keyword),
    keywordInMeta: containsKeyword(metaDescription, keyword),
    h1Count: h1Texts.length,
    keywordInH1: h1Texts.some((text) => containsKeyword(text, keyword)),
    h2Count: $('body h2').length,
    keywordDensity: calculateKeywordDensity(extractText($, 'body'), keyword),
    internalLinkCount: linkKinds.filter((kind) => kind === 'internal').length,
    externalLinkCount: linkKinds.filter((kind) => kind === 'external').length,
    imagesMissingAlt,
    schemaBlockCount: $('script[type="application/ld+json"]').length,
    hasCanonical: $('link[rel="canonical"]').length > 0,
  };
}
