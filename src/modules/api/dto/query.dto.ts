import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { EVALUATION_METRICS, EvaluationMetric } from '../../../config/evaluation.config';
import { MetadataFilter } from '../../milvus/types/milvus.types';
import { RETRIEVAL_MODES, RetrievalMode } from '../../retrieval/retrieval.types';
import { IsMetadataFilter } from '../validators/metadata.validators';

export class SearchDto {
  @ApiProperty({ description: 'The name of the collection to query.', example: 'versioned_docs' })
  @IsString()
  @IsNotEmpty()
  collection!: string;

  @ApiProperty({ description: 'The question to ask.', example: 'How do I enable dynamic fields?' })
  @IsString()
  @IsNotEmpty()
  question!: string;

  @ApiPropertyOptional({ enum: RETRIEVAL_MODES, default: 'dense' })
  @IsOptional()
  @IsIn(RETRIEVAL_MODES)
  mode?: RetrievalMode;

  @ApiPropertyOptional({ description: 'Maximum number of chunks to retrieve.', example: 4 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number;

  @ApiPropertyOptional({ description: 'Equality filter on chunk metadata.', example: { version: '2.2' } })
  @IsOptional()
  @IsMetadataFilter()
  filter?: MetadataFilter;
}

export class QueryDto extends SearchDto { }

export class EvaluateDto {
  @ApiProperty({ example: 'versioned_docs' })
  @IsString()
  @IsNotEmpty()
  collection!: string;

  @ApiProperty({ type: [String] })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  questions!: string[];

  @ApiProperty({ type: [String], description: 'Reference answers, one per question.' })
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  groundTruths!: string[];

  @ApiPropertyOptional({ enum: RETRIEVAL_MODES, default: 'dense' })
  @IsOptional()
  @IsIn(RETRIEVAL_MODES)
  mode?: RetrievalMode;

  @ApiPropertyOptional({ example: 4 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number;

  @ApiPropertyOptional({ example: { version: '2.2' } })
  @IsOptional()
  @IsMetadataFilter()
  filter?: MetadataFilter;

  @ApiPropertyOptional({ enum: EVALUATION_METRICS, isArray: true })
  @IsOptional()
  @IsArray()
  @IsIn(EVALUATION_METRICS, { each: true })
  metrics?: EvaluationMetric[];
}
