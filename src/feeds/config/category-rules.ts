import { CategoryRule } from '../types/feeds.types';

export const CATEGORY_RULES = Symbol('CATEGORY_RULES');

// Declaration order is the tie-break order: on equal scores the earlier category wins.
// Terms are matched as whole words against normalized (lowercase, punctuation-free) text.
export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = freezeRules([
  {
    label: 'Italia',
    keywords: [
      { terms: ['italia', 'italy'], weight: 3 },
      { terms: ['roma', 'rome', 'milano', 'milan'], weight: 2 },
      { terms: ['governo', 'senato', 'camera', 'parlamento'], weight: 4 },
    ],
    exclude: ['ue', 'eu', 'nato', 'europa'],
    threshold: 5,
  },
  {
    label: 'Economy',
    keywords: [
      { terms: ['pil', 'gdp'], weight: 4 },
      { terms: ['inflazione', 'inflation'], weight: 3 },
      { terms: ['spread', 'bce', 'ecb'], weight: 4 },
    ],
    threshold: 6,
  },
  {
    label: 'USA',
    keywords: [
      { terms: ['usa', 'u s a', 'united states'], weight: 5 },
      { terms: ['white house', 'congresso usa'], weight: 4 },
    ],
    threshold: 4,
  },
]);

export function freezeRules(rules: CategoryRule[]): readonly CategoryRule[] {
  return Object.freeze(
    rules.map((rule) =>
      Object.freeze({
        ...rule,
        keywords: Object.freeze(
          rule.keywords.map((keyword) =>
            Object.freeze({
              ...keyword,
              terms: Object.freeze([...keyword.terms]),
            }),
          ),
        ),
        exclude: Object.freeze([...(rule.exclude ?? [])]),
      }),
    ),
  );
}
