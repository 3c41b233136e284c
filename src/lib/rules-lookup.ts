/**
 * Country rules: per-country answers and side-by-side comparison.
 */

import type {
  RuleAnswer,
  RuleComparison,
  RuleEntry,
  RulesDocument,
} from "@/types/rules";

export const NOT_AVAILABLE = "N/A";

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/**
 * Plain text of an HTML answer: block tags become spaces, other tags drop
 * out, entities are decoded and whitespace collapsed.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<\s*(br|\/p|\/li|\/div)\s*\/?>/gi, " ")
    .replace(/<[^>]*>/g, "")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

export function answerText(answer: RuleAnswer | undefined): string {
  if (answer === undefined) return "";
  if (typeof answer === "string") return answer.trim();
  return stripHtml(answer.answer_html);
}

export class RulesLookup {
  constructor(private readonly document: RulesDocument) {}

  /**
   * Every question the country has a non-empty answer for, in document order.
   */
  byCountry(countryCode: string): RuleEntry[] {
    const code = countryCode.trim().toUpperCase();
    const entries: RuleEntry[] = [];
    for (const q of this.document.questions) {
      const answer = answerText(q.answers_by_country[code]);
      if (answer) entries.push({ question: q.question, answer });
    }
    return entries;
  }

  /**
   * Questions where at least one of the two countries has an answer.
   * A missing side reads "N/A".
   */
  compare(firstCountry: string, secondCountry: string): RuleComparison[] {
    const a = firstCountry.trim().toUpperCase();
    const b = secondCountry.trim().toUpperCase();

    return this.document.questions
      .map((q) => ({
        question: q.question,
        first: answerText(q.answers_by_country[a]) || NOT_AVAILABLE,
        second: answerText(q.answers_by_country[b]) || NOT_AVAILABLE,
      }))
      .filter((row) => row.first !== NOT_AVAILABLE || row.second !== NOT_AVAILABLE);
  }

  countries(): string[] {
    const codes = new Set<string>();
    for (const q of this.document.questions) {
      for (const [code, answer] of Object.entries(q.answers_by_country)) {
        if (answerText(answer)) codes.add(code.toUpperCase());
      }
    }
    return [...codes].sort();
  }
}
