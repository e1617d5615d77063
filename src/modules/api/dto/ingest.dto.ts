import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsOptional, IsString, IsUrl, Min } from 'class-validator';
import { ChunkMetadata } from '../../milvus/types/milvus.types';
import { IsChunkMetadata } from '../validators/metadata.validators';

export class IngestTextDto {
  @ApiProperty({ description: 'Stable identifier of the source document. Chunk ids derive from it.', example: 'release-notes-2.2' })
  @IsString()
  @IsNotEmpty()
  sourceId!: string;

  @ApiProperty({ description: 'Plain text or markdown content.' })
  @IsString()
  @IsNotEmpty()
  text!: string;

  @ApiPropertyOptional({ description: 'Tags stored on every chunk.', example: { version: '2.2' } })
  @IsOptional()
  @IsChunkMetadata()
  metadata?: ChunkMetadata;

  @ApiPropertyOptional({ description: 'Chunk size in characters.', example: 1000 })
  @IsOptional()
  @IsInt()
  @Min(1)
  chunkSize?: number;

  @ApiPropertyOptional({ description: 'Characters carried over between chunks.', example: 200 })
  @IsOptional()
  @IsInt()
  @Min(0)
  chunkOverlap?: number;
}

export class IngestUrlDto {
  @ApiProperty({ description: 'Document to download and partition.', example: 'https://example.com/guide.pdf' })
  @IsUrl({ require_protocol: true })
  url!: string;

  @ApiPropertyOptional({ description: 'Tags stored on every chunk.', example: { version: '2.3' } })
  @IsOptional()
  @IsChunkMetadata()
  metadata?: ChunkMetadata;
}

/**
 * Multipart fields sent alongside the uploaded file
 */
export class IngestFileDto {
  @ApiPropertyOptional({ description: 'Source identifier. Defaults to the file name.' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sourceId?: string;

  @ApiPropertyOptional({ description: 'JSON object of tags stored on every chunk.', example: '{"version":"2.2"}' })
  @IsOptional()
  @IsString()
  metadata?: string;
}
