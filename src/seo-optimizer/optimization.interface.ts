import { SchemaType } from './seo-optimizer.constants';

export interface OptimizationRequest {
  htmlFragment: string;
  focusKeyword: string;
  priorScore: number;
  categories: readonly string[];
  tags: readonly string[];
  image?: string;
  schemaType: SchemaType;
}

export interface OptimizerSettings {
  siteUrl: string;
  siteName: string;
  authorName: string;
  authorityLinkUrl: string;
  authorityLinkLabel: string;
}

export interface OptimizationResult {
  readonly scoreBefore: number;
  readonly scoreAfter: number;
  readonly improvement: number;
  readonly rewrittenHtml: string;
  /** Percentage, rounded to two decimals. */
  readonly keywordDensity: number;
  readonly titleLength: number;
  readonly metaLength: number;
  readonly optimizationsApplied: readonly string[];
}
