export interface Paper {
  readonly pubmed_id: string;
  readonly title: string;
  /** `YYYY-MM-DD`, `YYYY-MM`, `YYYY`, or empty when the record carries no usable date. */
  readonly publication_date: string;
  readonly company_authors: readonly string[];
  readonly company_affiliations: readonly string[];
  readonly author_emails: readonly string[];
}
