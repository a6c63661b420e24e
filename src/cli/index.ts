#!/usr/bin/env node
import { program } from 'commander';
import pino from 'pino';
import type { Logger } from 'pino';
import { LoadFailedError, NearstoreError } from '../core/errors.js';
import { DocumentStore } from '../store/document-store.js';
import colors from '../utils/colors.js';
import {
  buildMockBatch,
  formatResults,
  parseEmbedding,
  parseFiniteNumber,
  parseKeyValues,
  parsePositiveInt,
} from './parse.js';

interface GlobalOptions {
  database: string;
  dimension: number;
  directory?: string;
  verbose?: boolean;
}

interface AddOptions {
  embedding: string;
  id?: string;
  metadata?: string[];
}

interface SearchCommandOptions {
  embedding: string;
  text?: string;
  numResults?: number;
  threshold?: number;
  filter?: string[];
}

interface DeleteOptions {
  id?: string[];
  filter?: string[];
}

interface MockOptions {
  count: number;
}

function createLogger(verbose: boolean): Logger {
  const level = verbose ? 'debug' : (process.env.LOG_LEVEL ?? 'warn');
  // stdout carries command output; logs go to stderr
  return pino({ name: 'nearstore', level }, pino.destination(2));
}

/**
 * Open the store named by the global options. Records that fail to load
 * are reported and skipped.
 */
async function openStore(): Promise<DocumentStore> {
  const globals = program.opts<GlobalOptions>();
  const logger = createLogger(Boolean(globals.verbose));
  const store = new DocumentStore({
    config: {
      name: globals.database,
      dimension: globals.dimension,
      directory: globals.directory,
    },
    logger,
  });

  try {
    await store.initialize();
  } catch (error) {
    if (!(error instanceof LoadFailedError)) throw error;
    console.error(colors.yellow(`Warning: ${error.failures.length} record(s) skipped while loading.`));
  }
  return store;
}

async function main() {
  program
    .name('nearstore')
    .description('Embedded vector store with hybrid (cosine + BM25) search')
    .version('0.1.0')
    .option('-d, --database <name>', 'Database name', 'nearstore-cli-db')
    .option('--dimension <n>', 'Embedding dimension', parsePositiveInt, 384)
    .option('--directory <path>', 'Parent directory for the database (default: per-user data directory)')
    .option('-v, --verbose', 'Log store activity to stderr (otherwise LOG_LEVEL, default warn)')
    .addHelpText(
      'after',
      `
${colors.bold('Examples:')}
  $ nearstore add "hello world" --embedding 0.1,0.2,0.3 --dimension 3
  $ nearstore search --embedding 0.1,0.2,0.3 --dimension 3 --text hello -n 5
  $ nearstore delete --filter source=mock_data
  $ nearstore mock -c 20
`
    );

  program
    .command('add')
    .description('Add a document with a precomputed embedding')
    .argument('<text>', 'Document text')
    .requiredOption('-e, --embedding <values>', 'Comma-separated embedding values')
    .option('--id <id>', 'Document ID (default: generated)')
    .option('-m, --metadata <pairs...>', 'Metadata as key=value pairs')
    .action(async (text: string, options: AddOptions) => {
      const store = await openStore();
      const embedding = parseEmbedding(options.embedding, store.dimension);
      const metadata = options.metadata ? parseKeyValues(options.metadata) : undefined;

      const id = await store.addDocumentWithEmbedding({ text, embedding, id: options.id, metadata });
      console.log(`${colors.green('Added document')} ${colors.cyan(id)}`);
    });

  program
    .command('search')
    .description('Search by embedding, optionally combined with BM25 over a query text')
    .requiredOption('-e, --embedding <values>', 'Comma-separated query embedding')
    .option('--text <query>', 'Query text for hybrid search')
    .option('-n, --num-results <n>', 'Maximum number of results', parsePositiveInt)
    .option('-t, --threshold <value>', 'Minimum cosine similarity', parseFiniteNumber)
    .option('-f, --filter <pairs...>', 'Only documents whose metadata matches key=value pairs')
    .action(async (options: SearchCommandOptions) => {
      const store = await openStore();
      const embedding = parseEmbedding(options.embedding, store.dimension);
      const searchOptions = {
        numResults: options.numResults,
        threshold: options.threshold,
        filter: options.filter ? parseKeyValues(options.filter, 'filter') : undefined,
      };

      const results = options.text
        ? await store.searchWithTextAndEmbedding(options.text, embedding, searchOptions)
        : await store.search(embedding, searchOptions);
      console.log(formatResults(results, colors));
    });

  program
    .command('delete')
    .description('Delete documents by ID or by metadata filter')
    .option('--id <ids...>', 'Document IDs to delete')
    .option('-f, --filter <pairs...>', 'Delete documents whose metadata matches key=value pairs')
    .action(async (options: DeleteOptions) => {
      if (!options.id && !options.filter) {
        throw new NearstoreError('Nothing to delete', ['Pass --id <ids...> or --filter key=value.']);
      }

      const store = await openStore();
      const removed: string[] = [];
      if (options.id) {
        removed.push(...(await store.deleteDocuments(options.id)));
      }
      if (options.filter) {
        removed.push(...(await store.deleteDocumentsByFilter(parseKeyValues(options.filter, 'filter'))));
      }
      console.log(`${colors.green('Deleted')} ${removed.length} document(s)`);
    });

  program
    .command('reset')
    .description('Remove every document from the database')
    .action(async () => {
      const store = await openStore();
      await store.reset();
      console.log(colors.green(`Database "${store.config.name}" reset`));
    });

  program
    .command('mock')
    .description('Fill the database with sample documents and random embeddings')
    .option('-c, --count <n>', 'Number of documents', parsePositiveInt, 10)
    .action(async (options: MockOptions) => {
      const store = await openStore();
      const ids = await store.addDocumentsWithEmbeddings(buildMockBatch(options.count, store.dimension));
      console.log(`${colors.green('Added')} ${ids.length} mock document(s) to "${store.config.name}"`);
    });

  await program.parseAsync();
}

// Run the CLI
main().catch((error: unknown) => {
  if (error instanceof NearstoreError) {
    console.error(colors.red(`${error.name}: ${error.message}`));
    for (const suggestion of error.suggestions) {
      console.error(colors.gray(`  - ${suggestion}`));
    }
  } else {
    console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
