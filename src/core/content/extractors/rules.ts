import type { SectionType } from '../types/scrape';

/** A case-insensitive substring pattern mapped to a category. */
export interface AttributeRule<C extends string> {
  pattern: string;
  category: C;
}

export type NoiseCategory = 'cookie' | 'modal' | 'popup' | 'overlay' | 'banner';

export const NOISE_RULES: readonly AttributeRule<NoiseCategory>[] = [
  { pattern: 'cookie', category: 'cookie' },
  { pattern: 'modal', category: 'modal' },
  { pattern: 'popup', category: 'popup' },
  { pattern: 'overlay', category: 'overlay' },
  { pattern: 'banner', category: 'banner' },
];

export const SECTION_HINT_RULES: readonly AttributeRule<SectionType>[] = [
  { pattern: 'hero', category: 'hero' },
  { pattern: 'faq', category: 'faq' },
  { pattern: 'pricing', category: 'pricing' },
];

// Originating tag → section type; consulted before class hints
export const SECTION_TAG_RULES: ReadonlyMap<string, SectionType> = new Map<string, SectionType>([
  ['header', 'nav'],
  ['nav', 'nav'],
  ['footer', 'footer'],
]);

/** First rule whose pattern occurs in any of the haystacks, or null. */
export function matchRule<C extends string>(
  rules: readonly AttributeRule<C>[],
  ...haystacks: Array<string | undefined>
): C | null {
  const subject = haystacks
    .filter((value): value is string => typeof value === 'string' && value.length > 0)
    .join(' ')
    .toLowerCase();

  if (!subject) return null;

  const rule = rules.find(candidate => subject.includes(candidate.pattern.toLowerCase()));
  return rule ? rule.category : null;
}
