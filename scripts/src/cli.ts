#!/usr/bin/env tsx
/**
 * techdoc-rag CLI
 *
 * Manage databases, ingest manuals and run hybrid searches against them.
 *
 * Usage:
 *   npm run cli -- <command> [options]
 *
 * Commands:
 *   create-db <name>
 *   list-dbs
 *   delete-db <name>
 *   ingest <db> <path...> [--meta key=value]... [--document-id id]
 *   search <db> "<query>" [--top-k N] [--filter key=value]...
 *          [--rerank | --rerank-local | --rerank-bge] [--keyword-boost]
 *   list-docs <db>
 *   delete-doc <db> <documentId>
 *
 * Environment variables are read from the process and from a `.env` file;
 * see `.env.example`.
 */

import { config as dotenvConfig } from 'dotenv';

import {
  IngestProgressStage,
  IngestionService,
  LogLevel,
  ProgressReporter,
  RerankFailurePolicy,
  SearchService,
  createDatabaseAdmin,
  createEmbeddingProvider,
  createLogger,
  createQdrantClient,
  createReranker,
  createVectorStore,
  loadAppConfig,
  type AppConfig,
  type Logger,
  type QdrantLike,
} from '@techdoc-rag/lib';

import { CliUsageError, parseCliArgs, type CliCommand, type ParsedArgs } from './args.js';
import {
  formatDatabases,
  formatDocuments,
  formatEmbeddingProgress,
  formatFileProgress,
  formatIngestResult,
  formatSearchResponse,
} from './format.js';

dotenvConfig();

function printHelp(): void {
  console.log(`
techdoc-rag - chunking and hybrid search for technical reference manuals

Usage:
  npm run cli -- <command> [options]

Commands:
  create-db <name>                 Create a database sized for the embedding model
  list-dbs                         List databases with their chunk counts
  delete-db <name>                 Delete a database
  ingest <db> <path...>            Ingest .pdf, .md, .markdown or .txt files
      --meta key=value             Metadata stored on every chunk (repeatable)
      --document-id ID             Document id (default: file name without extension)
  search <db> "<query>"            Search a database
      --top-k N                    Number of results (default: TOP_K_RESULTS or 5)
      --filter key=value           Exact-match filter (repeatable); integers match as numbers
      --rerank                     Rerank with Cohere (requires COHERE_API_KEY)
      --rerank-local               Rerank with the local cross-encoder service
      --rerank-bge                 Rerank with the BGE cross-encoder service
      --keyword-boost              Boost chunks naming the query's register identifiers
  list-docs <db>                   List documents in a database
  delete-doc <db> <documentId>     Delete a document's chunks

Options:
  --verbose                        Show detailed logging (DEBUG level)
  --quiet                          Minimal output (ERROR level only)
  --log-format=FMT                 Log format: text, json, compact, pretty (default: pretty)
  -h, --help                       Show this help message

Examples:
  npm run cli -- create-db rm0008
  npm run cli -- ingest rm0008 manuals/rm0008.pdf --meta family=f1
  npm run cli -- search rm0008 "AFIO_MAPR SWJ_CFG" --keyword-boost --rerank-local
  npm run cli -- search rm0008 "DMA channel priority" --filter page=278
`);
}

function createCliLogger(args: ParsedArgs): Logger {
  let level: LogLevel = LogLevel.INFO;
  if (args.verbose) level = LogLevel.DEBUG;
  if (args.quiet) level = LogLevel.ERROR;

  return createLogger('cli', {
    level,
    format: args.logFormat,
    timestamps: true,
    colors: true,
  });
}

interface Context {
  config: Readonly<AppConfig>;
  client: QdrantLike;
  logger: Logger;
}

function print(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

async function requireDatabase(context: Context, database: string): Promise<boolean> {
  const admin = createDatabaseAdmin({ client: context.client, logger: context.logger });
  if (await admin.exists(database)) {
    return true;
  }
  console.error(`Error: Database '${database}' not found. Create it first with 'create-db'.`);
  return false;
}

function openStore(context: Context, database: string) {
  return createVectorStore({
    database,
    client: context.client,
    qdrant: context.config.qdrant,
    logger: context.logger,
  });
}

// ============================================================================
// Commands
// ============================================================================

async function run(cli: Exclude<CliCommand, { command: 'help' }>, context: Context): Promise<number> {
  const { config, client, logger } = context;

  switch (cli.command) {
    case 'create-db': {
      const embedder = createEmbeddingProvider(config.embedding, logger);
      await createDatabaseAdmin({ client, logger }).createDatabase(cli.database, embedder.dimensions);
      console.log(`Created database: ${cli.database} (${embedder.dimensions} dimensions, ${embedder.model})`);
      return 0;
    }

    case 'list-dbs':
      print(formatDatabases(await createDatabaseAdmin({ client, logger }).listDatabases()));
      return 0;

    case 'delete-db':
      await createDatabaseAdmin({ client, logger }).deleteDatabase(cli.database);
      console.log(`Deleted database: ${cli.database}`);
      return 0;

    case 'ingest': {
      if (!(await requireDatabase(context, cli.database))) {
        return 1;
      }
      const ingestion = new IngestionService({
        embedder: createEmbeddingProvider(config.embedding, logger),
        store: openStore(context, cli.database),
        config: config.pipeline,
        logger,
      });

      const reporter = new ProgressReporter(cli.paths.length, {
        operationName: 'Ingest',
        logger,
        onProgress: (entry) => {
          if (cli.paths.length > 1 && entry.current > 0 && entry.state === 'running') {
            console.log(formatFileProgress(entry));
          }
        },
      });
      reporter.start();

      for (const path of cli.paths) {
        console.log(`Processing: ${path}`);
        try {
          await ingestion.ingestFile(path, {
            metadata: cli.metadata,
            ...(cli.documentId !== undefined ? { documentId: cli.documentId } : {}),
            onProgress: (event) => {
              switch (event.stage) {
                case IngestProgressStage.EMBEDDING:
                  console.log(formatEmbeddingProgress(event));
                  break;
                case IngestProgressStage.DOCUMENT:
                  console.log(formatIngestResult(cli.database, event.result));
                  break;
              }
            },
          });
          reporter.success(path);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Ingestion failed', { path, error: message });
          console.error(`  Error: ${message}`);
          reporter.fail(path, message);
        }
      }
      reporter.complete();
      const failures = reporter.getProgress().failedCount;
      return failures > 0 ? 1 : 0;
    }

    case 'search': {
      if (!(await requireDatabase(context, cli.database))) {
        return 1;
      }
      const service = new SearchService({
        embedder: createEmbeddingProvider(config.embedding, logger),
        store: openStore(context, cli.database),
        config: config.pipeline.search,
        rerankerFor: (backend) => createReranker(backend, config.rerank, logger),
        logger,
      });
      const response = await service.search({
        text: cli.query,
        keywordBoost: cli.keywordBoost,
        onRerankFailure: RerankFailurePolicy.DEGRADE,
        ...(cli.topK !== undefined ? { topK: cli.topK } : {}),
        ...(cli.rerank ? { rerank: cli.rerank } : {}),
        ...(Object.keys(cli.filter).length > 0 ? { filter: cli.filter } : {}),
      });
      print(formatSearchResponse(response));
      return 0;
    }

    case 'list-docs': {
      if (!(await requireDatabase(context, cli.database))) {
        return 1;
      }
      print(formatDocuments(cli.database, await openStore(context, cli.database).listDocuments()));
      return 0;
    }

    case 'delete-doc': {
      if (!(await requireDatabase(context, cli.database))) {
        return 1;
      }
      const deleted = await openStore(context, cli.database).deleteDocument(cli.documentId);
      if (deleted === 0) {
        console.error(`Document '${cli.documentId}' not found in database.`);
        return 1;
      }
      console.log(`Deleted ${deleted} chunks from '${cli.documentId}'`);
      return 0;
    }
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Run with --help for usage.');
      return 2;
    }
    throw error;
  }

  if (args.cli.command === 'help') {
    printHelp();
    return 0;
  }

  const logger = createCliLogger(args);
  try {
    const config = loadAppConfig();
    const client = createQdrantClient(config.qdrant);
    return await run(args.cli, { config, client, logger });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug('Command failed', { command: args.cli.command, error: message });
    console.error(`Error: ${message}`);
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
