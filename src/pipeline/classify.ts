/**
 * Keyword classifiers.
 *
 * Two named strategies share one interface:
 * - PriorityKeywordClassifier: specificity-first, first match wins.
 * - HintCountClassifier: most keyword hits wins.
 *
 * Both are pure: the same table and text always give the same category.
 */

import type { ClassificationRule, RuleTable } from "../contracts";
import { RuleTableError } from "../lib/errors";

export type ClassifierStrategy = "priority" | "hint-count";

export interface CategoryClassifier<C extends string = string> {
  readonly strategy: ClassifierStrategy;
  readonly fallback: C;
  classify(title: string, summary?: string | null): C;
}

function buildText(title: string, summary?: string | null): string {
  return summary ? `${title.toLowerCase()} ${summary.toLowerCase()}` : title.toLowerCase();
}

function assertUsable<C extends string>(table: RuleTable<C>): void {
  if (table.rules.length === 0) {
    throw new RuleTableError("Rule table is empty.");
  }
  if (!table.rules.some((r) => r.category === table.fallback)) {
    throw new RuleTableError(
      `Fallback category "${table.fallback}" has no rule in the table.`
    );
  }
}

function isPhrase(keyword: string): boolean {
  return keyword.includes(" ");
}

/**
 * Three passes, each in table order:
 * 1. multi-word phrases of every specific rule,
 * 2. single words of every specific rule,
 * 3. the fallback rule's keywords.
 * No match anywhere resolves to the fallback.
 */
export class PriorityKeywordClassifier<C extends string = string>
  implements CategoryClassifier<C>
{
  readonly strategy = "priority";
  readonly fallback: C;
  private readonly specific: readonly ClassificationRule<C>[];
  private readonly general: readonly ClassificationRule<C>[];

  constructor(table: RuleTable<C>) {
    assertUsable(table);
    this.fallback = table.fallback;
    this.specific = table.rules.filter((r) => r.category !== table.fallback);
    this.general = table.rules.filter((r) => r.category === table.fallback);
  }

  classify(title: string, summary?: string | null): C {
    const text = buildText(title, summary);

    for (const rule of this.specific) {
      if (rule.keywords.some((kw) => isPhrase(kw) && text.includes(kw))) {
        return rule.category;
      }
    }
    for (const rule of this.specific) {
      if (rule.keywords.some((kw) => !isPhrase(kw) && text.includes(kw))) {
        return rule.category;
      }
    }
    for (const rule of this.general) {
      if (rule.keywords.some((kw) => text.includes(kw))) {
        return rule.category;
      }
    }
    return this.fallback;
  }
}

/**
 * Counts distinct keyword hits per category; the highest total wins and
 * ties go to the earlier rule. Zero hits resolves to the fallback.
 */
export class HintCountClassifier<C extends string = string>
  implements CategoryClassifier<C>
{
  readonly strategy = "hint-count";
  readonly fallback: C;
  private readonly rules: readonly ClassificationRule<C>[];

  constructor(table: RuleTable<C>) {
    assertUsable(table);
    this.fallback = table.fallback;
    this.rules = table.rules;
  }

  /** Hit count per category, in table order. */
  score(title: string, summary?: string | null): Array<{ category: C; hits: number }> {
    const text = buildText(title, summary);
    return this.rules.map((rule) => ({
      category: rule.category,
      hits: new Set(rule.keywords.filter((kw) => text.includes(kw))).size,
    }));
  }

  classify(title: string, summary?: string | null): C {
    let best: C = this.fallback;
    let bestHits = 0;
    for (const { category, hits } of this.score(title, summary)) {
      if (hits > bestHits) {
        best = category;
        bestHits = hits;
      }
    }
    return best;
  }
}

export function createClassifier<C extends string>(
  strategy: ClassifierStrategy,
  table: RuleTable<C>
): CategoryClassifier<C> {
  switch (strategy) {
    case "priority":
      return new PriorityKeywordClassifier(table);
    case "hint-count":
      return new HintCountClassifier(table);
  }
}
