import { z } from 'zod';
import rulesJson from './rules.json';

export type Verdict = 'academic' | 'company';

export type AffiliationRule = {
  id: string;
  verdict: Verdict;
  pattern: RegExp;
};

const RuleSourceSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
});

export const RuleTableSchema = z.object({
  academic: z.array(RuleSourceSchema),
  company: z.array(RuleSourceSchema),
});

export type RuleTableSource = z.infer<typeof RuleTableSchema>;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** A configured keyword matches on word boundaries, case-insensitively. */
export function keywordRule(keyword: string, verdict: Verdict): AffiliationRule {
  return {
    id: `keyword:${keyword.toLowerCase()}`,
    verdict,
    pattern: new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i'),
  };
}

/**
 * Compile a rule table into a single ordered list: every academic rule precedes every
 * company rule, and within a group the table order is the priority order.
 */
export function compileRules(
  source: unknown,
  extra: { academicKeywords?: string[]; companyKeywords?: string[] } = {}
): AffiliationRule[] {
  const table = RuleTableSchema.parse(source);
  const compile = (verdict: Verdict) => (r: { id: string; pattern: string }) => ({
    id: r.id,
    verdict,
    pattern: new RegExp(r.pattern, 'i'),
  });

  return [
    ...table.academic.map(compile('academic')),
    ...(extra.academicKeywords ?? []).map((k) => keywordRule(k, 'academic')),
    ...table.company.map(compile('company')),
    ...(extra.companyKeywords ?? []).map((k) => keywordRule(k, 'company')),
  ];
}

export const DEFAULT_RULE_TABLE: RuleTableSource = RuleTableSchema.parse(rulesJson);
