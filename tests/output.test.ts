import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { escapeCsv, toCsv, toCsvRow } from '../src/output/csv';
import { ConsoleSink, CsvFileSink, formatPaper } from '../src/output/sinks';
import type { Paper } from '../src/parse/types';

const HEADER =
  'PubmedID,Title,Publication Date,Company Affiliation Author(s),Company Affiliation(s),Corresponding Author Email(s)';

const chugai: Paper = {
  pubmed_id: '90000002',
  title: 'Safety of a recombinant protein vaccine, a phase 2 trial',
  publication_date: '2023',
  company_authors: ['Akira Tanaka'],
  company_affiliations: ['Chugai Pharmaceutical Co., Ltd., Tokyo, Japan'],
  author_emails: ['tanaka@chugai.example'],
};

const acme: Paper = {
  pubmed_id: '90000020',
  title: 'Adjuvant dose finding',
  publication_date: '',
  company_authors: ['Amy Lee', 'Bob Park'],
  company_affiliations: ['Acme Vaccines Inc.', 'Acme Vaccines Inc.'],
  author_emails: [],
};

describe('escapeCsv', () => {
  it('leaves plain values alone', () => {
    expect(escapeCsv('plain text')).toBe('plain text');
    expect(escapeCsv(null)).toBe('');
  });

  it('quotes commas, quotes and line breaks', () => {
    expect(escapeCsv('a, b')).toBe('"a, b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('toCsv', () => {
  it('writes one row per paper with joined multi-value fields', () => {
    expect(toCsvRow(chugai)).toBe(
      '90000002,"Safety of a recombinant protein vaccine, a phase 2 trial",2023,Akira Tanaka,' +
        '"Chugai Pharmaceutical Co., Ltd., Tokyo, Japan",tanaka@chugai.example'
    );
    expect(toCsvRow(acme)).toBe(
      '90000020,Adjuvant dose finding,,Amy Lee; Bob Park,Acme Vaccines Inc.; Acme Vaccines Inc.,'
    );
  });

  it('writes only the header for no papers', () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });
});

describe('CsvFileSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'papers-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the file only on close', async () => {
    const file = path.join(dir, 'out.csv');
    const sink = new CsvFileSink(file);

    sink.write(chugai);
    sink.write(acme);
    expect(fs.existsSync(file)).toBe(false);
    expect(sink.count).toBe(2);

    await sink.close();
    expect(fs.readFileSync(file, 'utf-8')).toBe(toCsv([chugai, acme]));
  });

  it('leaves an existing file untouched until close', () => {
    const file = path.join(dir, 'existing.csv');
    fs.writeFileSync(file, 'previous run\n');

    new CsvFileSink(file).write(chugai);

    expect(fs.readFileSync(file, 'utf-8')).toBe('previous run\n');
  });
});

describe('ConsoleSink', () => {
  it('prints a block per paper and a closing rule', async () => {
    const lines: string[] = [];
    const sink = new ConsoleSink((line) => lines.push(line));

    sink.write(chugai);
    await sink.close();

    expect(lines).toEqual([formatPaper(chugai), '-'.repeat(50)]);
  });

  it('reports when nothing was written', async () => {
    const lines: string[] = [];
    await new ConsoleSink((line) => lines.push(line)).close();
    expect(lines).toEqual(['No papers with company-affiliated authors found.']);
  });

  it('labels missing dates and emails', () => {
    expect(formatPaper(acme).split('\n')).toEqual([
      '-'.repeat(50),
      'Pubmed ID      : 90000020',
      'Title          : Adjuvant dose finding',
      'Date           : Unknown',
      'Author(s)      : Amy Lee, Bob Park',
      'Affiliation(s) : Acme Vaccines Inc. | Acme Vaccines Inc.',
      'Email(s)       : N/A',
    ]);
  });
});
