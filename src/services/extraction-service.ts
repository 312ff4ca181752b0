import type { ExtractionConfidence } from "../types";
import type {
  AppPatternConfig,
  CustomerPatternConfig,
  ErrorTypePatternConfig,
} from "../config/pipeline.config";
import { Rule, RuleList } from "../utils/rule-list";

export const UNKNOWN = "Unknown";

/**
 * Error type of issues no error-type rule matches
 */
export const OTHER_ERROR_TYPE = "Other";

/**
 * Extracted customer with the confidence of the rule that found it
 */
export interface CustomerExtraction {
  value: string;
  confidence: ExtractionConfidence;
  /** Rule that produced the value; absent when nothing matched */
  rule?: string;
}

/**
 * Values that fill customer fields without naming a customer
 */
const PLACEHOLDER_VALUES = new Set([
  "none",
  "unknown",
  "n/a",
  "na",
  "tbd",
  "to be determined",
  "internal",
  "test",
  "demo",
  "sample",
  "example",
]);

const TIER_ANNOTATION_REGEX = /\(?\s*\btier\s*\d+\s*\)?/gi;

/**
 * Builds a case-insensitive matcher for a literal name, bounded by non-alphanumerics
 */
function literalMatcher(name: string): RegExp {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`(?<![A-Za-z0-9])${escaped}(?![A-Za-z0-9])`, "i");
}

/**
 * Recovers the integration application, the customer and the error type from issue text
 * using ordered, first-match-wins rule lists
 */
export class ExtractionService {
  readonly appRules: RuleList<string, string>;
  readonly customerRules: RuleList<
    string,
    string,
    CustomerPatternConfig["confidence"]
  >;
  readonly errorTypeRules: RuleList<string, string>;
  private readonly stopWords: ReadonlySet<string>;
  private readonly appMatchers: readonly RegExp[];

  constructor(options: {
    appPatterns: readonly AppPatternConfig[];
    customerPatterns: readonly CustomerPatternConfig[];
    customerStopWords: readonly string[];
    errorTypePatterns: readonly ErrorTypePatternConfig[];
  }) {
    this.stopWords = new Set(
      options.customerStopWords.map((word) => word.toLowerCase())
    );

    const appRules = options.appPatterns.map(
      (app): Rule<string, string> => {
        const matcher = app.pattern
          ? new RegExp(app.pattern, "i")
          : literalMatcher(app.name);
        return {
          name: app.name,
          tag: undefined,
          apply: (text) => (matcher.test(text) ? app.name : undefined),
        };
      }
    );
    this.appRules = new RuleList(appRules);
    this.appMatchers = options.appPatterns.map((app) => literalMatcher(app.name));

    this.customerRules = new RuleList(
      options.customerPatterns.map((pattern) => this.toCustomerRule(pattern))
    );

    this.errorTypeRules = new RuleList(
      options.errorTypePatterns.map((rule): Rule<string, string> => {
        const matcher = new RegExp(rule.pattern, "i");
        return {
          name: rule.name,
          tag: undefined,
          apply: (text) => (matcher.test(text) ? rule.type : undefined),
        };
      })
    );
  }

  /**
   * Finds the highest-priority known application mentioned in the summary or description
   * @returns The application name, or "Unknown"
   */
  extractIntegrationApp(summary: string, description?: string): string {
    const match = this.appRules.evaluate(this.combineText(summary, description));
    return match ? match.value : UNKNOWN;
  }

  /**
   * Finds a customer name using the rule with the highest confidence that yields a candidate
   */
  extractCustomer(summary: string, description?: string): CustomerExtraction {
    const match = this.customerRules.evaluate(
      this.combineText(summary, description)
    );
    if (!match) {
      return { value: UNKNOWN, confidence: "none" };
    }
    return { value: match.value, confidence: match.tag, rule: match.rule };
  }

  /**
   * Classifies the kind of failure an issue describes
   * @returns The type of the first matching rule, or "Other"
   */
  extractErrorType(summary: string, description?: string): string {
    const match = this.errorTypeRules.evaluate(this.combineText(summary, description));
    return match ? match.value : OTHER_ERROR_TYPE;
  }

  private combineText(summary: string, description?: string): string {
    return description ? `${summary}\n${description}` : summary;
  }

  /**
   * Turns a configured pattern into a rule returning the first acceptable candidate in reading order
   */
  private toCustomerRule(
    pattern: CustomerPatternConfig
  ): Rule<string, string, CustomerPatternConfig["confidence"]> {
    const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
    const regex = new RegExp(pattern.pattern, flags);

    return {
      name: pattern.name,
      tag: pattern.confidence,
      apply: (text) => {
        for (const match of text.matchAll(regex)) {
          const candidate = this.cleanCandidate(match[1] ?? "");
          if (candidate && this.wordCount(candidate) >= pattern.minWords) {
            return candidate;
          }
        }
        return undefined;
      },
    };
  }

  /**
   * Normalizes a raw candidate: drops tier annotations, cuts at " - ", trims punctuation,
   * then trims stop words and application names off both ends
   * @returns The cleaned name, or undefined when nothing acceptable remains
   */
  private cleanCandidate(raw: string): string | undefined {
    const text = raw
      .replace(TIER_ANNOTATION_REGEX, " ")
      .split(/\s+-\s+/)[0]
      .replace(/\s+/g, " ")
      .trim()
      .replace(/^[\s"'`*#:]+|[\s"'`*.:!?]+$/g, "");

    if (text.startsWith("h1.") || text.startsWith("h2.")) {
      return undefined;
    }

    const words = text.split(" ").filter((word) => word.length > 0);
    while (words.length > 0 && this.isNoise(words[0])) {
      words.shift();
    }
    while (words.length > 0 && this.isNoise(words[words.length - 1])) {
      words.pop();
    }

    const candidate = words.join(" ");
    if (
      candidate.length < 2 ||
      PLACEHOLDER_VALUES.has(candidate.toLowerCase()) ||
      this.isKnownApp(candidate)
    ) {
      return undefined;
    }
    return candidate;
  }

  private isNoise(word: string): boolean {
    const bare = word.replace(/^[^\w&]+|[^\w&]+$/g, "").toLowerCase();
    return bare.length === 0 || this.stopWords.has(bare) || this.isKnownApp(word);
  }

  private isKnownApp(text: string): boolean {
    const bare = text.replace(/^[^\w]+|[^\w]+$/g, "");
    return this.appMatchers.some((matcher) => {
      const match = bare.match(matcher);
      return match !== null && match[0].length === bare.length;
    });
  }

  private wordCount(text: string): number {
    return text.split(" ").filter((word) => word.length > 0).length;
  }
}
