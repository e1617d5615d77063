import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { MilvusModule } from '../milvus/milvus.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { CollectionsController } from './collections.controller';
import { IngestionController } from './ingestion.controller';
import { QueryController } from './query.controller';

/**
 * API Module - HTTP surface over ingestion, retrieval and evaluation
 */
@Module({
  imports: [MilvusModule, RetrievalModule, IngestionModule, PipelineModule],
  controllers: [CollectionsController, IngestionController, QueryController],
})
export class ApiModule { }
