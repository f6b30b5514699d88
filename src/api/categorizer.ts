/**
 * Rule-based expense categorizer.
 * Categories: Food & Dining, Transportation, Shopping, Entertainment,
 * Bills & Utilities, Healthcare, Education, Travel, Savings & Investment, Other
 */
import { z } from 'zod';
import { CATEGORIES, DEFAULT_CATEGORY, type Category } from '../domain/types.js';
import rawKeywords from './categoryKeywords.json' with { type: 'json' };

interface KeywordRule {
  keyword: string;
  category: Category;
}

const keywordTableSchema = z.array(
  z.object({
    keyword: z.string().min(1),
    category: z.enum(CATEGORIES),
  }),
);

/**
 * Normalize description text for matching
 * - Trim whitespace
 * - Convert to lowercase
 * - Collapse multiple spaces to single space
 * - Normalize curly apostrophes to straight ones
 */
export function normalize(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[‘’]/g, "'");
}

/**
 * Keyword table (priority order - first match wins).
 * Order matters: "uber eats lunch" is Food & Dining because food keywords come first.
 */
const RULES: readonly KeywordRule[] = keywordTableSchema
  .parse(rawKeywords)
  .map((r) => ({ keyword: normalize(r.keyword), category: r.category }));

/**
 * Categorize an expense based on its description.
 * Returns the matched category or 'Other' if no keyword matches.
 */
export function categorize(description: string): Category {
  const normalized = normalize(description);

  for (const rule of RULES) {
    if (normalized.includes(rule.keyword)) {
      return rule.category;
    }
  }

  return DEFAULT_CATEGORY;
}

// Single words users type for a category in budget commands ("set food budget to 400")
const CATEGORY_ALIASES: readonly [string, Category][] = [
  ['food', 'Food & Dining'],
  ['dining', 'Food & Dining'],
  ['transport', 'Transportation'],
  ['shopping', 'Shopping'],
  ['entertainment', 'Entertainment'],
  ['bills', 'Bills & Utilities'],
  ['utilities', 'Bills & Utilities'],
  ['health', 'Healthcare'],
  ['education', 'Education'],
  ['travel', 'Travel'],
  ['savings', 'Savings & Investment'],
  ['investment', 'Savings & Investment'],
  ['other', 'Other'],
];

/**
 * Resolve a category named in free text. Unlike categorize(), returns null
 * when the text names nothing recognizable instead of falling back to Other.
 */
export function resolveCategory(text: string): Category | null {
  const normalized = normalize(text);
  if (!normalized) return null;

  for (const category of CATEGORIES) {
    if (normalized === category.toLowerCase()) return category;
  }
  for (const category of CATEGORIES) {
    // "other" is only taken as a whole word below ("another" must not match)
    if (category !== DEFAULT_CATEGORY && normalized.includes(category.toLowerCase())) {
      return category;
    }
  }

  const words = new Set(normalized.split(/[^a-z0-9&]+/));
  for (const [alias, category] of CATEGORY_ALIASES) {
    if (words.has(alias)) return category;
  }

  for (const rule of RULES) {
    if (normalized.includes(rule.keyword)) return rule.category;
  }
  return null;
}

/**
 * Get all available categories
 */
export function getAllCategories(): Category[] {
  return [...CATEGORIES];
}
