import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { MilvusModule } from '../milvus/milvus.module';
import { MilvusHealthIndicator } from './milvus.health';

@Module({
  imports: [TerminusModule, MilvusModule],
  controllers: [HealthController],
  providers: [MilvusHealthIndicator],
})
export class HealthModule { }
