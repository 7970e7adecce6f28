import { Inject, Injectable, Logger } from '@nestjs/common';
import { CATEGORY_RULES } from '../config/category-rules';
import { UNCATEGORIZED_LABEL } from '../config/feeds.constants';
import { CategoryRule, CategoryScores } from '../types/feeds.types';
import { escapeRegExp, normalizeForMatching } from '../utils/text.util';

interface CompiledRule {
  label: string;
  threshold: number;
  keywords: { pattern: RegExp; weight: number }[];
  exclude: RegExp[];
}

const WORD_EDGE = '[\\p{L}\\p{N}_]';

function compileTerms(terms: readonly string[]): RegExp {
  const alternatives = terms
    .map((term) => normalizeForMatching(term))
    .filter(Boolean)
    .map((term) => escapeRegExp(term));
  if (alternatives.length === 0) {
    // never matches
    return /(?!)/u;
  }
  return new RegExp(
    `(?<!${WORD_EDGE})(?:${alternatives.join('|')})(?!${WORD_EDGE})`,
    'iu',
  );
}

@Injectable()
export class FeedClassifierService {
  private readonly logger = new Logger(FeedClassifierService.name);
  private readonly rules: CompiledRule[];

  constructor(@Inject(CATEGORY_RULES) rules: readonly CategoryRule[]) {
    this.rules = rules.map((rule) => ({
      label: rule.label,
      threshold: rule.threshold,
      keywords: rule.keywords.map((keyword) => ({
        pattern: compileTerms(keyword.terms),
        weight: keyword.weight,
      })),
      exclude: (rule.exclude ?? []).map((term) => compileTerms([term])),
    }));
  }

  get labels(): string[] {
    return this.rules.map((rule) => rule.label);
  }

  classify(text: unknown): string {
    try {
      if (typeof text !== 'string') {
        throw new TypeError(`expected text, received ${typeof text}`);
      }
      const normalized = normalizeForMatching(text);
      if (!normalized) {
        return UNCATEGORIZED_LABEL;
      }
      return this.pickCategory(this.scoreNormalized(normalized));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`classification error: ${message}`);
      return UNCATEGORIZED_LABEL;
    }
  }

  score(text: string): CategoryScores {
    return this.scoreNormalized(normalizeForMatching(text));
  }

  private scoreNormalized(normalized: string): CategoryScores {
    const scores: Record<string, number> = {};
    const excluded: string[] = [];
    const qualifying: string[] = [];

    for (const rule of this.rules) {
      if (rule.exclude.some((pattern) => pattern.test(normalized))) {
        excluded.push(rule.label);
        continue;
      }

      const score = rule.keywords.reduce(
        (sum, keyword) =>
          keyword.pattern.test(normalized) ? sum + keyword.weight : sum,
        0,
      );
      scores[rule.label] = score;
      if (score >= rule.threshold) {
        qualifying.push(rule.label);
      }
    }

    return { scores, excluded, qualifying };
  }

  private pickCategory(result: CategoryScores): string {
    let best: string | null = null;
    let bestScore = Number.NEGATIVE_INFINITY;
    // qualifying keeps declaration order, so a strict comparison lets the earlier label win ties
    for (const label of result.qualifying) {
      const score = result.scores[label] ?? 0;
      if (score > bestScore) {
        best = label;
        bestScore = score;
      }
    }
    return best ?? UNCATEGORIZED_LABEL;
  }
}
