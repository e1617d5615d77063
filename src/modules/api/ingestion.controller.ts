import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Logger,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { IngestionService } from '../ingestion/ingestion.service';
import { IngestionResult } from '../ingestion/ingestion.types';
import { ChunkMetadata } from '../milvus/types/milvus.types';
import { IngestFileDto, IngestTextDto, IngestUrlDto } from './dto/ingest.dto';
import { chunkMetadataSchema } from './validators/metadata.validators';

@ApiTags('ingestion')
@Controller('collections/:name')
export class IngestionController {
  private readonly logger = new Logger(IngestionController.name);

  constructor(private readonly ingestionService: IngestionService) { }

  @Post('documents')
  @HttpCode(201)
  @ApiOperation({ summary: 'Ingest text', description: 'Chunks plain text or markdown locally, embeds and stores it.' })
  @ApiResponse({ status: 201, description: 'Chunk counts.' })
  @ApiResponse({ status: 409, description: 'The source was already ingested.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async ingestText(@Param('name') name: string, @Body() dto: IngestTextDto): Promise<IngestionResult> {
    this.logger.log(`🌐 HTTP REQUEST: Ingest '${dto.sourceId}' into '${name}' (${dto.text.length} chars)`);
    return this.ingestionService.ingestText(name, {
      sourceId: dto.sourceId,
      text: dto.text,
      metadata: dto.metadata,
      chunking: { chunkSize: dto.chunkSize, overlap: dto.chunkOverlap },
    });
  }

  @Post('urls')
  @HttpCode(201)
  @ApiOperation({ summary: 'Ingest a URL', description: 'Downloads a document and partitions it with the Unstructured API.' })
  @ApiResponse({ status: 201, description: 'Chunk counts.' })
  @ApiResponse({ status: 502, description: 'Download or partitioning failed.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async ingestUrl(@Param('name') name: string, @Body() dto: IngestUrlDto): Promise<IngestionResult> {
    this.logger.log(`🌐 HTTP REQUEST: Ingest URL ${dto.url} into '${name}'`);
    return this.ingestionService.ingestUrl(name, dto.url, dto.metadata);
  }

  @Post('files')
  @HttpCode(201)
  @UseInterceptors(FileInterceptor('file'))
  @ApiConsumes('multipart/form-data')
  @ApiOperation({ summary: 'Ingest a file', description: 'Uploads a file (PDF, DOCX, HTML, ...) to be partitioned and stored.' })
  @ApiBody({
    description: 'The file to upload, with optional source id and metadata.',
    schema: {
      type: 'object',
      properties: {
        file: { type: 'string', format: 'binary' },
        sourceId: { type: 'string' },
        metadata: { type: 'string', description: 'JSON object, e.g. {"version":"2.2"}' },
      },
    },
  })
  @ApiResponse({ status: 201, description: 'Chunk counts.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async ingestFile(
    @Param('name') name: string,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: IngestFileDto,
  ): Promise<IngestionResult> {
    if (!file) {
      throw new BadRequestException('A file is required');
    }

    this.logger.log(`🌐 HTTP REQUEST: Ingest file ${file.originalname} (${file.size} bytes) into '${name}'`);
    return this.ingestionService.ingestFile(name, {
      filename: file.originalname,
      content: file.buffer,
      mimeType: file.mimetype,
      sourceId: dto.sourceId,
      metadata: parseMetadataField(dto.metadata),
    });
  }
}

function parseMetadataField(raw: string | undefined): ChunkMetadata {
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new BadRequestException('metadata must be a JSON object');
  }

  const parsed = chunkMetadataSchema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestException('metadata values must be scalars, arrays of scalars or null');
  }
  return parsed.data;
}
