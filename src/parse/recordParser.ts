import { classify as defaultClassify, type Classifier } from '../classify/affiliation';
import { ParseError } from '../errors';
import type { Paper } from './types';
import { attr, child, children, markupText, parser, path, textOf, validateXml } from './xml';

const MONTHS: Record<string, string> = {
  jan: '01',
  feb: '02',
  mar: '03',
  apr: '04',
  may: '05',
  jun: '06',
  jul: '07',
  aug: '08',
  sep: '09',
  oct: '10',
  nov: '11',
  dec: '12',
};

const EMAIL_RE = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g;

const RECORD_RE = /<PubmedArticle(?:\s[^>]*)?>[\s\S]*?<\/PubmedArticle>/g;

const BOOK_RECORD_RE = /<PubmedBookArticle(?:\s[^>]*)?>/g;

/** Cut a PubmedArticleSet document into one XML string per article, in document order. */
export function splitRecords(xml: string): string[] {
  return xml.match(RECORD_RE) ?? [];
}

/** Book records (`PubmedBookArticle`) carry no journal metadata and are not parsed. */
export function countBookRecords(xml: string): number {
  return (xml.match(BOOK_RECORD_RE) ?? []).length;
}

function normalizeMonth(raw: string): string | undefined {
  const s = raw.trim().toLowerCase();
  if (/^\d{1,2}$/.test(s)) {
    const n = Number(s);
    return n >= 1 && n <= 12 ? String(n).padStart(2, '0') : undefined;
  }
  return MONTHS[s.slice(0, 3)];
}

function formatDate(node: unknown): string {
  const year = textOf(child(node, 'Year'));
  if (!/^\d{4}$/.test(year)) return '';
  const month = normalizeMonth(textOf(child(node, 'Month')));
  if (!month) return year;
  const dayRaw = textOf(child(node, 'Day'));
  const day = /^\d{1,2}$/.test(dayRaw) ? dayRaw.padStart(2, '0') : undefined;
  return day ? `${year}-${month}-${day}` : `${year}-${month}`;
}

export function extractPublicationDate(article: unknown): string {
  const pubDate = path(article, 'Journal', 'JournalIssue', 'PubDate');
  const fromPubDate = formatDate(pubDate);
  if (fromPubDate) return fromPubDate;

  const medline = textOf(child(pubDate, 'MedlineDate')).match(/\b(\d{4})\b/);
  if (medline) return medline[1]!;

  for (const articleDate of children(article, 'ArticleDate')) {
    const d = formatDate(articleDate);
    if (d) return d;
  }
  return '';
}

export function extractEmails(text: string): string[] {
  return (text.match(EMAIL_RE) ?? []).map((e) => e.replace(/[.\-_]+$/, ''));
}

function authorName(author: unknown): string {
  const given = textOf(child(author, 'ForeName')) || textOf(child(author, 'Initials'));
  const last = textOf(child(author, 'LastName'));
  const name = [given, last].filter(Boolean).join(' ');
  return name || textOf(child(author, 'CollectiveName'));
}

function extractPmid(pubmedArticle: unknown): string {
  const pmid = textOf(path(pubmedArticle, 'MedlineCitation', 'PMID'));
  if (pmid) return pmid;
  const ids = children(path(pubmedArticle, 'PubmedData', 'ArticleIdList'), 'ArticleId');
  const pubmedId = ids.find((id) => attr(id, 'IdType') === 'pubmed');
  return textOf(pubmedId);
}

export function parseRecord(xml: string, classifier: Classifier = defaultClassify): Paper {
  const invalid = validateXml(xml);
  if (invalid) throw new ParseError(`Malformed XML: ${invalid}`);

  const doc: unknown = parser.parse(xml);
  const pubmedArticle =
    child(doc, 'PubmedArticle') ?? path(doc, 'PubmedArticleSet', 'PubmedArticle');
  if (pubmedArticle === undefined) throw new ParseError('No PubmedArticle element');

  const pmid = extractPmid(pubmedArticle);
  if (!pmid) throw new ParseError('Missing PMID');

  const article = path(pubmedArticle, 'MedlineCitation', 'Article');
  const title =
    markupText(child(article, 'ArticleTitle')) || markupText(child(article, 'VernacularTitle'));
  if (!title) throw new ParseError('Missing title', pmid);

  const companyAuthors: string[] = [];
  const companyAffiliations: string[] = [];
  const emails = new Map<string, string>();

  for (const author of children(child(article, 'AuthorList'), 'Author')) {
    const name = authorName(author);
    if (!name) continue;

    const affiliationInfos = children(author, 'AffiliationInfo');
    const affiliations = affiliationInfos.flatMap((info) =>
      children(info, 'Affiliation').map(markupText).filter(Boolean)
    );
    const companyAffs = affiliations.filter((a) => classifier(a).isCompany);
    if (companyAffs.length === 0) continue;

    companyAuthors.push(name);
    companyAffiliations.push(...companyAffs);

    const candidates = [
      ...affiliations.flatMap(extractEmails),
      ...children(author, 'Email').map(textOf),
      ...affiliationInfos.flatMap((info) => children(info, 'Email').map(textOf)),
    ];
    for (const email of candidates) {
      const key = email.toLowerCase();
      if (email && !emails.has(key)) emails.set(key, email);
    }
  }

  return Object.freeze({
    pubmed_id: pmid,
    title,
    publication_date: extractPublicationDate(article),
    company_authors: Object.freeze(companyAuthors),
    company_affiliations: Object.freeze(companyAffiliations),
    author_emails: Object.freeze([...emails.values()]),
  });
}
