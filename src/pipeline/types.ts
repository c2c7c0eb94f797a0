import type { Classifier } from '../classify/affiliation';
import type { OutputSink } from '../output/sinks';
import type { Logger } from '../utils/logger';

export interface PipelineInput {
  query: string;
  maxResults: number;
  sink: OutputSink;
}

export interface LiteratureSource {
  search(query: string, maxResults: number): Promise<string[]>;
  fetch(ids: readonly string[]): Promise<string>;
}

export interface PipelineDeps {
  client: LiteratureSource;
  batchSize: number;
  classifier?: Classifier;
  logger?: Logger;
}

export interface PipelineResult {
  written: number;
  stats: {
    found: number;
    fetched: number;
    parseFailures: number;
    skippedBooks: number;
    failedBatches: number;
    processingTimeMs: number;
  };
}
