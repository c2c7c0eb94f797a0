#!/usr/bin/env node
import 'dotenv/config';
import { createClassifier } from './classify/affiliation';
import { parseCliArgs, USAGE } from './cli/args';
import { loadConfig } from './config';
import { RequestError, ValidationError } from './errors';
import { PubMedClient, type HttpFetch } from './ingest/pubmed/client';
import { ConsoleSink, CsvFileSink, type OutputSink } from './output/sinks';
import { runPipeline } from './pipeline/runPipeline';
import { createLogger } from './utils/logger';

export type MainOverrides = {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: HttpFetch;
  print?: (line: string) => void;
};

export async function main(argv: string[], overrides: MainOverrides = {}): Promise<number> {
  const print = overrides.print ?? ((line: string) => console.log(line));

  try {
    const config = loadConfig(overrides.env ?? process.env);
    const args = parseCliArgs(argv, config.defaultMaxResults);
    if (args.help) {
      print(USAGE);
      return 0;
    }

    const level = args.debug ? 'debug' : config.logLevel;
    const logger = createLogger('Pipeline', level);
    const client = new PubMedClient({
      ...config,
      fetchImpl: overrides.fetchImpl,
      logger: createLogger('PubMed', level),
    });
    const classifier = createClassifier({
      companyKeywords: config.companyKeywords,
      academicKeywords: config.academicKeywords,
    });
    const sink: OutputSink = args.file ? new CsvFileSink(args.file) : new ConsoleSink(print);

    logger.debug('Starting run', {
      query: args.query,
      max: args.maxResults,
      output: args.file ?? 'console',
      fetchConcurrency: client.fetchConcurrency,
    });

    const result = await runPipeline(
      { query: args.query, maxResults: args.maxResults, sink },
      { client, classifier, logger, batchSize: config.batchSize }
    );
    await sink.close();

    logger.debug('Run complete', result.stats);
    if (args.file) {
      print(`Saved ${result.written} result(s) to '${args.file}'`);
    }
    return 0;
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(error.message);
      console.error(USAGE);
    } else if (error instanceof RequestError) {
      console.error(`Request to PubMed failed: ${error.message}`);
    } else {
      console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error('Fatal error:', err);
      process.exit(1);
    });
}
