import type { Paper } from '../parse/types';

export const CSV_HEADER = [
  'PubmedID',
  'Title',
  'Publication Date',
  'Company Affiliation Author(s)',
  'Company Affiliation(s)',
  'Corresponding Author Email(s)',
];

export const MULTI_VALUE_DELIMITER = '; ';

export function escapeCsv(val: unknown): string {
  if (val == null) return '';
  const s = String(val);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function toCsvRow(paper: Paper): string {
  return [
    paper.pubmed_id,
    paper.title,
    paper.publication_date,
    paper.company_authors.join(MULTI_VALUE_DELIMITER),
    paper.company_affiliations.join(MULTI_VALUE_DELIMITER),
    paper.author_emails.join(MULTI_VALUE_DELIMITER),
  ]
    .map(escapeCsv)
    .join(',');
}

export function toCsv(papers: readonly Paper[]): string {
  const rows = [CSV_HEADER.map(escapeCsv).join(','), ...papers.map(toCsvRow)];
  return rows.join('\n') + '\n';
}
