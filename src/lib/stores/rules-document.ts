/**
 * Loader for the country rules document (data/rules.json).
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import type { RulesDocument } from "@/types/rules";

const answerSchema = z.union([
  z.string(),
  z.object({
    answer_html: z.string().default(""),
    links: z.array(z.string()).optional(),
    last_reviewed: z.string().optional(),
  }),
]);

const questionSchema = z.object({
  id: z.string(),
  question: z.string(),
  category: z.string().optional(),
  tags: z.array(z.string()).optional(),
  answers_by_country: z.record(z.string(), answerSchema).default({}),
});

export const rulesDocumentSchema = z.union([
  z.object({ questions: z.array(questionSchema) }),
  // Bare list form
  z.array(questionSchema).transform((questions) => ({ questions })),
]);

export function parseRulesDocument(raw: unknown): RulesDocument {
  return rulesDocumentSchema.parse(raw);
}

export function loadRulesDocument(path: string): RulesDocument {
  return parseRulesDocument(JSON.parse(readFileSync(path, "utf8")));
}
