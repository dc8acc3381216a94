import { CONTENT_CATEGORIES, type ContentCategory } from '@topicreel/shared';

/** Keyword-based classifier for scene narration */

export const CATEGORY_KEYWORDS: Record<ContentCategory, readonly string[]> = {
  action: ['move', 'run', 'walk', 'travel', 'journey', 'go', 'arrive', 'leave', 'fast', 'quick'],
  dramatic: ['dramatic', 'emotional', 'sad', 'happy', 'surprise', 'shock', 'reveal'],
  temporal: ['time', 'then', 'next', 'after', 'before', 'meanwhile', 'suddenly'],
  scale: ['big', 'small', 'large', 'tiny', 'huge', 'grow', 'shrink', 'expand'],
};

export const GROWTH_KEYWORDS: readonly string[] = ['big', 'large', 'huge', 'grow', 'expand'];
export const SHRINK_KEYWORDS: readonly string[] = ['small', 'tiny', 'shrink'];

export type ScaleDirection = 'growth' | 'shrink';

function normalize(text: unknown): string {
  return typeof text === 'string' ? text.trim().toLowerCase() : '';
}

/** Every category with at least one keyword occurring in the text (substring match). */
export function classifyScene(text: unknown): Set<ContentCategory> {
  const content = normalize(text);
  const categories = new Set<ContentCategory>();
  if (!content) return categories;

  for (const category of CONTENT_CATEGORIES) {
    if (CATEGORY_KEYWORDS[category].some((keyword) => content.includes(keyword))) {
      categories.add(category);
    }
  }
  return categories;
}

/** Growth wins when both directions occur. */
export function scaleDirection(text: unknown): ScaleDirection | null {
  const content = normalize(text);
  if (!content) return null;
  if (GROWTH_KEYWORDS.some((keyword) => content.includes(keyword))) return 'growth';
  if (SHRINK_KEYWORDS.some((keyword) => content.includes(keyword))) return 'shrink';
  return null;
}
