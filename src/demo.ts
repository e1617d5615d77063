import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { errorMessage } from './common/errors';
import { IngestionService } from './modules/ingestion/ingestion.service';
import { MilvusService } from './modules/milvus/milvus.service';
import { RagPipelineService } from './modules/pipeline/rag-pipeline.service';

const COLLECTION = `versioned_docs_demo_${Date.now()}`;
const QUESTION = 'How are fields that are not in the schema handled on insert?';

const RELEASES = [
  {
    version: '2.2',
    text: `# Schema

Every field written on insert must be declared in the collection schema. Rows carrying undeclared fields are rejected.

# Limits

A collection holds at most 64 fields.`,
  },
  {
    version: '2.3',
    text: `# Schema

Collections created with dynamic fields enabled accept fields that are not declared in the schema. Undeclared fields are stored in a hidden JSON column and can be used in filters.

# Limits

A collection holds at most 64 declared fields; dynamic fields do not count towards the limit.`,
  },
];

/**
 * Versioned documents recipe: the same question answered against two tagged
 * releases of a document, then with hybrid retrieval over both.
 */
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();

  const logger = app.get(Logger);
  const milvus = app.get(MilvusService);
  const ingestion = app.get(IngestionService);
  const pipeline = app.get(RagPipelineService);

  try {
    await milvus.createCollection(COLLECTION, { description: 'Versioned documents demo' });

    for (const release of RELEASES) {
      const result = await ingestion.ingestText(COLLECTION, {
        sourceId: `schema-docs-${release.version}`,
        text: release.text,
        metadata: { version: release.version },
        chunking: { chunkSize: 200, overlap: 0 },
      });
      logger.log(`📄 Version ${release.version}: ${result.storedCount} chunks stored`);
    }

    for (const release of RELEASES) {
      const response = await pipeline.ask({
        collection: COLLECTION,
        question: QUESTION,
        mode: 'dense',
        topK: 2,
        filter: { version: release.version },
      });
      logger.log(`💬 [${release.version}] ${response.answer}`);
    }

    const hybrid = await pipeline.ask({ collection: COLLECTION, question: QUESTION, mode: 'hybrid', topK: 3 });
    logger.log(`💬 [hybrid] ${hybrid.answer}`);
    logger.log(`📚 Sources: ${hybrid.sources.map((source) => `${source.metadata.version}:${source.score.toFixed(3)}`).join(', ')}`);
  } finally {
    if (await milvus.collectionExists(COLLECTION)) {
      await milvus.dropCollection(COLLECTION);
    }
    await app.close();
  }
}

main().catch((error: unknown) => {
  console.error(`❌ Demo failed: ${errorMessage(error)}`);
  process.exit(1);
});
