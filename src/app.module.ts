import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { validateEnv } from './config/env.schema';
import appConfig from './config/app.config';
import milvusConfig from './config/milvus.config';
import openaiConfig from './config/openai.config';
import rerankerConfig from './config/reranker.config';
import unstructuredConfig from './config/unstructured.config';
import ragConfig from './config/rag.config';
import evaluationConfig from './config/evaluation.config';
import { ApiModule } from './modules/api/api.module';
import { MilvusModule } from './modules/milvus/milvus.module';
import { LlmModule } from './modules/llm/llm.module';
import { RetrievalModule } from './modules/retrieval/retrieval.module';
import { IngestionModule } from './modules/ingestion/ingestion.module';
import { EvaluationModule } from './modules/evaluation/evaluation.module';
import { PipelineModule } from './modules/pipeline/pipeline.module';
import { HealthModule } from './modules/health/health.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, milvusConfig, openaiConfig, rerankerConfig, unstructuredConfig, ragConfig, evaluationConfig],
      validate: (config) => {
        const result = validateEnv(config);
        if (!result.success) {
          throw new Error(`Environment validation failed: ${result.error}`);
        }
        return result.data;
      },
    }),
    LoggerModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (config: ConfigType<typeof appConfig>) => ({
        pinoHttp: {
          level: config.logLevel,
          transport: config.logPretty ? { target: 'pino-pretty', options: { singleLine: true } } : undefined,
          autoLogging: config.env !== 'test',
        },
      }),
    }),
    MilvusModule,
    LlmModule,
    RetrievalModule,
    IngestionModule,
    EvaluationModule,
    PipelineModule,
    ApiModule,
    HealthModule,
  ],
})
export class AppModule { }
