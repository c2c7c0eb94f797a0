import { writeFile } from 'fs/promises';
import type { Paper } from '../parse/types';
import { toCsv } from './csv';

export interface OutputSink {
  write(paper: Paper): void | Promise<void>;
  close(): Promise<void>;
}

/**
 * Collects rows in memory and writes the file only on close(), so a run that fails
 * before closing leaves any existing file untouched.
 */
export class CsvFileSink implements OutputSink {
  private papers: Paper[] = [];

  constructor(private readonly filePath: string) {}

  get count(): number {
    return this.papers.length;
  }

  write(paper: Paper): void {
    this.papers.push(paper);
  }

  async close(): Promise<void> {
    await writeFile(this.filePath, toCsv(this.papers), 'utf-8');
  }
}

const RULE = '-'.repeat(50);

export function formatPaper(paper: Paper): string {
  return [
    RULE,
    `Pubmed ID      : ${paper.pubmed_id}`,
    `Title          : ${paper.title}`,
    `Date           : ${paper.publication_date || 'Unknown'}`,
    `Author(s)      : ${paper.company_authors.join(', ')}`,
    `Affiliation(s) : ${paper.company_affiliations.join(' | ')}`,
    `Email(s)       : ${paper.author_emails.join(', ') || 'N/A'}`,
  ].join('\n');
}

export class ConsoleSink implements OutputSink {
  private written = 0;

  constructor(private readonly print: (line: string) => void = (line) => console.log(line)) {}

  write(paper: Paper): void {
    this.print(formatPaper(paper));
    this.written++;
  }

  async close(): Promise<void> {
    if (this.written === 0) {
      this.print('No papers with company-affiliated authors found.');
      return;
    }
    this.print(RULE);
  }
}
