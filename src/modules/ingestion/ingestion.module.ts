import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { MilvusModule } from '../milvus/milvus.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { ChunkerService } from './chunker.service';
import { IngestionService } from './ingestion.service';
import { PartitionService } from './partition.service';

@Module({
    imports: [MilvusModule, LlmModule, RetrievalModule],
    providers: [ChunkerService, PartitionService, IngestionService],
    exports: [ChunkerService, PartitionService, IngestionService],
})
export class IngestionModule { }
