import 'dotenv/config';
import { parseArgs } from 'util';
import { createRAGService } from './bootstrap.js';
import { loadConfig } from './config/index.js';
import { RAGError, errorMessage } from './rag/errors.js';
import type { IngestionProgress, RetrievalResult, RetrievalStrategy } from './rag/types.js';

const USAGE = `Usage:
  multimodal-rag ingest <file...> [--parallel]
  multimodal-rag query <text> [--strategy semantic|hybrid|expanded] [--n <count>] [--rerank]
  multimodal-rag answer <text> [--n <count>]
  multimodal-rag classify <text>
  multimodal-rag delete <documentId>
  multimodal-rag stats`;

const STRATEGIES: readonly RetrievalStrategy[] = ['semantic', 'hybrid', 'expanded'];

function parseStrategy(value: string | undefined): RetrievalStrategy | undefined {
  if (value === undefined) return undefined;
  const strategy = STRATEGIES.find((s) => s === value);
  if (!strategy) {
    throw new Error(`Unknown strategy "${value}". Expected one of: ${STRATEGIES.join(', ')}`);
  }
  return strategy;
}

function parseCount(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function printResult(result: RetrievalResult): void {
  console.log(
    `\n${result.matches.length} results for "${result.query}" (intent: ${result.intent}, strategy: ${result.strategy}` +
      `${result.degraded ? ', degraded' : ''}${result.reranked ? ', reranked' : ''})`
  );
  if (result.expandedQueries?.length) {
    console.log(`Expanded queries:\n${result.expandedQueries.map((q) => `  - ${q}`).join('\n')}`);
  }
  result.matches.forEach((match, i) => {
    const preview = match.chunk.text.replace(/\s+/g, ' ').slice(0, 160);
    console.log(`\n[${i + 1}] ${match.chunk.sourceName} #${match.chunk.position} (${match.chunk.modality}) score=${match.score.toFixed(3)}`);
    console.log(`    ${preview}${match.chunk.text.length > 160 ? '...' : ''}`);
  });
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      parallel: { type: 'boolean', default: false },
      rerank: { type: 'boolean', default: false },
      strategy: { type: 'string' },
      n: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...args] = positionals;
  if (!command || values.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  if (config.vectorStore === 'memory' && command !== 'classify') {
    console.warn('[CLI] VECTOR_STORE=memory keeps nothing between runs; set VECTOR_STORE=lancedb to persist');
  }

  const service = await createRAGService(config);
  service.on('ingestion_progress', (progress: IngestionProgress) => {
    if (progress.status === 'processing' && progress.currentDocument) {
      console.log(`[CLI] (${progress.processedDocuments}/${progress.totalDocuments}) ${progress.currentDocument}`);
    }
  });

  try {
    const text = args.join(' ');
    switch (command) {
      case 'ingest': {
        const batch = await service.ingestFiles(args, { parallel: values.parallel });
        for (const result of batch.results) {
          console.log(
            result.success
              ? `✓ ${result.sourceName}: ${result.chunksCreated} chunks (${result.documentId})`
              : `✗ ${result.sourceName}: ${result.error}`
          );
        }
        if (batch.failure) {
          process.exitCode = 1;
        }
        break;
      }
      case 'query':
        printResult(
          await service.retrieve({
            query: text,
            strategy: parseStrategy(values.strategy),
            nResults: parseCount(values.n),
            rerank: values.rerank,
          })
        );
        break;
      case 'answer': {
        const result = await service.answer(text, { nResults: parseCount(values.n) });
        console.log(result.answer ?? `No answer: ${result.error}`);
        console.log(`\nSources: ${[...new Set(result.sources.map((s) => s.chunk.sourceName))].join(', ')}`);
        break;
      }
      case 'classify': {
        const { intent, strategy } = service.classify(text);
        console.log(`intent: ${intent}, strategy: ${strategy}`);
        break;
      }
      case 'delete':
        console.log(`Removed ${await service.deleteDocument(text)} chunks`);
        break;
      case 'stats': {
        const stats = await service.stats();
        console.log(`documents: ${stats.documentCount}, chunks: ${stats.chunkCount}`);
        break;
      }
      default:
        console.log(USAGE);
        process.exitCode = 1;
    }
  } finally {
    await service.close();
  }
}

main().catch((error) => {
  if (error instanceof RAGError) {
    console.error(`[${error.code}] ${error.message}`);
  } else {
    console.error('Fatal error:', errorMessage(error));
  }
  process.exit(1);
});
