/**
 * Country rules document (data/rules.json)
 */

export interface RichRuleAnswer {
  answer_html: string;
  links?: string[];
  last_reviewed?: string;
}

/** A country's answer: plain text or an HTML answer with links */
export type RuleAnswer = string | RichRuleAnswer;

export interface RuleQuestion {
  id: string;
  question: string;
  category?: string;
  tags?: string[];
  /** Keyed by ISO 2-letter country code */
  answers_by_country: Record<string, RuleAnswer>;
}

export interface RulesDocument {
  questions: RuleQuestion[];
}

export interface RuleEntry {
  question: string;
  answer: string;
}

export interface RuleComparison {
  question: string;
  first: string;
  second: string;
}
