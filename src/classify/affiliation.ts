import { compileRules, DEFAULT_RULE_TABLE, type AffiliationRule } from './rules';

export type AffiliationClassification = {
  isCompany: boolean;
  companyName?: string;
  /** Id of the rule that decided the verdict; absent when the default applied. */
  matchedRule?: string;
};

export type Classifier = (affiliationText: string) => AffiliationClassification;

export type ClassifierOptions = {
  rules?: unknown;
  companyKeywords?: string[];
  academicKeywords?: string[];
};

function extractCompanyName(text: string, pattern: RegExp): string | undefined {
  const segments = text.split(',').map((s) => s.trim());
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i]!;
    const m = pattern.exec(segment);
    if (!m) continue;

    let end = m.index + m[0].length;
    while (end < segment.length && /\w/.test(segment[end]!)) end++;
    if (segment[end] === '.') end++;

    const name = segment.slice(0, end).trim();
    // "Genentech, Inc." splits the suffix into its own segment.
    if (m.index === 0 && i > 0 && segments[i - 1]) {
      return `${segments[i - 1]}, ${name}`;
    }
    return name || undefined;
  }
  return undefined;
}

export function createClassifier(options: ClassifierOptions = {}): Classifier {
  const rules: AffiliationRule[] = compileRules(options.rules ?? DEFAULT_RULE_TABLE, {
    companyKeywords: options.companyKeywords,
    academicKeywords: options.academicKeywords,
  });

  return (affiliationText: string): AffiliationClassification => {
    const text = (affiliationText ?? '').replace(/\s+/g, ' ').trim();
    if (!text) return { isCompany: false };

    for (const rule of rules) {
      if (!rule.pattern.test(text)) continue;
      if (rule.verdict === 'academic') {
        return { isCompany: false, matchedRule: rule.id };
      }
      return {
        isCompany: true,
        companyName: extractCompanyName(text, rule.pattern) ?? text,
        matchedRule: rule.id,
      };
    }

    // Unmatched affiliations are not counted as industry.
    return { isCompany: false };
  };
}

export const classify: Classifier = createClassifier();
