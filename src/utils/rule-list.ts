/**
 * A named rule that may produce a value for an input
 */
export interface Rule<TInput, TValue, TTag = undefined> {
  readonly name: string;
  readonly tag: TTag;
  readonly apply: (input: TInput) => TValue | undefined;
}

/**
 * The value a rule produced, together with the rule that produced it
 */
export interface RuleMatch<TValue, TTag> {
  readonly value: TValue;
  readonly rule: string;
  readonly tag: TTag;
}

/**
 * Ordered, first-match-wins rule list.
 * Rules are evaluated top-down; the first rule returning a value decides the result.
 */
export class RuleList<TInput, TValue, TTag = undefined> {
  readonly rules: readonly Rule<TInput, TValue, TTag>[];

  constructor(rules: readonly Rule<TInput, TValue, TTag>[]) {
    const names = new Set<string>();
    for (const rule of rules) {
      if (names.has(rule.name)) {
        throw new Error(`Duplicate rule name: ${rule.name}`);
      }
      names.add(rule.name);
    }
    this.rules = Object.freeze([...rules]);
  }

  /**
   * Returns the first match, or undefined when no rule applies
   */
  evaluate(input: TInput): RuleMatch<TValue, TTag> | undefined {
    for (const rule of this.rules) {
      const value = rule.apply(input);
      if (value !== undefined) {
        return { value, rule: rule.name, tag: rule.tag };
      }
    }
    return undefined;
  }
}
