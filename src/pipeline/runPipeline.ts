import { classify as defaultClassify } from '../classify/affiliation';
import { ParseError, RequestError } from '../errors';
import { batchIds } from '../ingest/pubmed/client';
import { countBookRecords, parseRecord, splitRecords } from '../parse/recordParser';
import type { Paper } from '../parse/types';
import { createLogger, type Logger } from '../utils/logger';
import type { PipelineDeps, PipelineInput, PipelineResult } from './types';

const defaultLogger: Logger = createLogger('Pipeline');

type BatchOutcome = { ok: true; xml: string } | { ok: false; reason: string };

export async function runPipeline(
  input: PipelineInput,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const startTime = Date.now();
  const logger = deps.logger ?? defaultLogger;
  const classifier = deps.classifier ?? defaultClassify;

  // Search failures propagate: nothing has been written yet.
  const ids = await deps.client.search(input.query, input.maxResults);
  logger.info(`Found ${ids.length} article ids`, { query: input.query, max: input.maxResults });

  const batches = batchIds(ids, deps.batchSize);
  const outcomes = await Promise.all(
    batches.map(async (batch, index): Promise<BatchOutcome> => {
      try {
        const xml = await deps.client.fetch(batch);
        logger.debug(`Fetched batch ${index + 1}/${batches.length}`, { ids: batch.length });
        return { ok: true, xml };
      } catch (err) {
        if (!(err instanceof RequestError)) throw err;
        logger.warn(`Fetch failed for batch ${index + 1}/${batches.length}, skipping`, {
          ids: batch.length,
          reason: err.message,
        });
        return { ok: false, reason: err.message };
      }
    })
  );

  const failedBatches = outcomes.filter((o) => !o.ok).length;
  if (batches.length > 0 && failedBatches === batches.length) {
    const reasons = outcomes.flatMap((o) => (o.ok ? [] : [o.reason]));
    throw new RequestError(`All ${batches.length} fetch batch(es) failed: ${reasons[0] ?? ''}`, '');
  }

  let fetched = 0;
  let parseFailures = 0;
  let skippedBooks = 0;
  const papers: Paper[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) continue;
    const books = countBookRecords(outcome.xml);
    if (books > 0) {
      skippedBooks += books;
      logger.debug(`Skipping ${books} book record(s)`);
    }
    for (const record of splitRecords(outcome.xml)) {
      fetched++;
      try {
        const paper = parseRecord(record, classifier);
        if (paper.company_authors.length > 0) papers.push(paper);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        parseFailures++;
        logger.warn('Skipping unparseable record', { reason: err.message });
      }
    }
  }

  const position = new Map(ids.map((id, i) => [id, i]));
  const rank = (p: Paper) => position.get(p.pubmed_id) ?? Number.MAX_SAFE_INTEGER;
  const ordered = papers
    .map((paper, arrival) => ({ paper, arrival }))
    .sort((a, b) => rank(a.paper) - rank(b.paper) || a.arrival - b.arrival)
    .map(({ paper }) => paper);

  for (const paper of ordered) {
    await input.sink.write(paper);
  }

  logger.info(`${ordered.length} papers with company-affiliated authors`, {
    fetched,
    parseFailures,
    skippedBooks,
    failedBatches,
  });

  return {
    written: ordered.length,
    stats: {
      found: ids.length,
      fetched,
      parseFailures,
      skippedBooks,
      failedBatches,
      processingTimeMs: Date.now() - startTime,
    },
  };
}
