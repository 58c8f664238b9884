import { LengthWindow } from '../utils/length-window';

export const TITLE_WINDOW: LengthWindow = Object.freeze({ min: 55, max: 60 });
export const META_WINDOW: LengthWindow = Object.freeze({ min: 140, max: 160 });
export const KEYWORD_DENSITY_BAND = Object.freeze({ min: 1.5, max: 2.5 });

export const MIN_H2_HEADINGS = 3;
export const INTERNAL_LINKS_TO_ADD = 2;
export const MAX_KEYWORD_INSERTIONS = 5;

export const SCHEMA_TYPES = ['Article', 'BlogPosting', 'NewsArticle', 'TechArticle'] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

export const DEFAULT_SCHEMA_TYPE: SchemaType = 'Article';
export const DEFAULT_CATEGORIES: readonly string[] = Object.freeze(['Blog']);

export const TITLE_FILLERS: readonly string[] = Object.freeze([
  'Complete Guide',
  'Tips and Best Practices',
  'Everything You Need to Know',
]);

export const META_FILLERS: readonly string[] = Object.freeze([
  'Read the full guide to learn what works and why.',
  'Get actionable advice you can apply today.',
  'Start improving today.',
]);

export const callToAction = (keyword: string) =>
  `Discover practical tips and expert insights on ${keyword}.`;

// Headings receive the keyword in title case.
export const HEADING_TEMPLATES: ReadonlyArray<(keyword: string) => string> = [
  (keyword) => `What Is ${keyword}?`,
  (keyword) => `Why ${keyword} Matters`,
  (keyword) => `How to Get Started with ${keyword}`,
  (keyword) => `Best Practices for ${keyword}`,
  (keyword) => `Common ${keyword} Mistakes to Avoid`,
];

export const SECTION_PARAGRAPHS: ReadonlyArray<(keyword: string) => string> = [
  (keyword) => `${keyword} covers the core ideas behind this topic and how they apply in practice.`,
  (keyword) => `Getting ${keyword} right improves results and saves time over the long run.`,
  (keyword) => `A few simple steps are enough to start applying ${keyword} with confidence.`,
  (keyword) => `Following proven habits keeps your ${keyword} work consistent and easy to maintain.`,
  (keyword) => `Knowing the usual pitfalls of ${keyword} helps you avoid them from the start.`,
];

export const KEYWORD_SENTENCES: ReadonlyArray<(keyword: string) => string> = [
  (keyword) => `${keyword} is worth understanding in detail.`,
  (keyword) => `Many readers turn to ${keyword} for exactly this reason.`,
  (keyword) => `Keep ${keyword} in mind as you apply these ideas.`,
  (keyword) => `A clear approach to ${keyword} makes a real difference.`,
  (keyword) => `This is where ${keyword} pays off.`,
];
