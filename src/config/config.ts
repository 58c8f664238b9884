import { registerAs } from '@nestjs/config';

const DEFAULT_SITE_URL = 'https://example.com';
const DEFAULT_AUTHORITY_LINK_URL =
  'https://developers.google.com/search/docs/fundamentals/seo-starter-guide';

export const optimizerConfig = registerAs('optimizer', () => ({
  siteUrl: (process.env.SITE_URL || DEFAULT_SITE_URL).replace(/\/+$/, ''),
  siteName: process.env.SITE_NAME || 'Example Blog',
  authorName: process.env.AUTHOR_NAME || 'Editorial Team',
  authorityLinkUrl: process.env.AUTHORITY_LINK_URL || DEFAULT_AUTHORITY_LINK_URL,
  authorityLinkLabel:
    process.env.AUTHORITY_LINK_LABEL || 'Google Search Central SEO Starter Guide',
  // milliseconds
  cacheTtl: parseInt(process.env.OPTIMIZER_CACHE_TTL ?? '', 10) || 3_600_000,
}));

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

export const validateEnvironment = (config: Record<string, unknown>) => {
  for (const key of ['SITE_URL', 'AUTHORITY_LINK_URL']) {
    const value = config[key];
    if (value !== undefined && value !== '' && !(typeof value === 'string' && isHttpUrl(value))) {
      throw new Error(`${key} must be an absolute http(s) URL`);
    }
  }
  for (const key of ['PORT', 'OPTIMIZER_CACHE_TTL']) {
    const value = config[key];
    if (value !== undefined && value !== '' && !/^\d+$/.test(String(value))) {
      throw new Error(`${key} must be a non-negative integer`);
    }
  }
  return config;
};
