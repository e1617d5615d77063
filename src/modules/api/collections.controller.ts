import { Body, Controller, Delete, Get, HttpCode, Logger, Param, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MilvusService } from '../milvus/milvus.service';
import { KeywordIndexService } from '../retrieval/keyword-index.service';
import { CreateCollectionDto } from './dto/collection.dto';

@ApiTags('collections')
@Controller('collections')
export class CollectionsController {
  private readonly logger = new Logger(CollectionsController.name);

  constructor(
    private readonly milvusService: MilvusService,
    private readonly keywordIndex: KeywordIndexService,
  ) { }

  @Post()
  @HttpCode(201)
  @ApiOperation({ summary: 'Create a collection', description: 'Creates an indexed, loaded collection for document chunks.' })
  @ApiResponse({ status: 201, description: 'Collection created.' })
  @ApiResponse({ status: 409, description: 'A collection with this name already exists.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async create(@Body() dto: CreateCollectionDto) {
    this.logger.log(`🌐 HTTP REQUEST: Create collection '${dto.name}'`);
    await this.milvusService.createCollection(dto.name, { dim: dto.dim, description: dto.description });
    return this.milvusService.getCollectionStats(dto.name);
  }

  @Get()
  @ApiOperation({ summary: 'List collections' })
  @ApiResponse({ status: 200, description: 'Collection names.' })
  async list() {
    return { collections: await this.milvusService.listCollections() };
  }

  @Get(':name')
  @ApiOperation({ summary: 'Collection statistics' })
  @ApiResponse({ status: 200, description: 'Row count and vector dimension.' })
  @ApiResponse({ status: 404, description: 'Collection not found.' })
  async stats(@Param('name') name: string) {
    return this.milvusService.getCollectionStats(name);
  }

  @Delete(':name')
  @HttpCode(204)
  @ApiOperation({ summary: 'Drop a collection' })
  @ApiResponse({ status: 204, description: 'Collection dropped.' })
  @ApiResponse({ status: 404, description: 'Collection not found.' })
  async drop(@Param('name') name: string): Promise<void> {
    this.logger.log(`🌐 HTTP REQUEST: Drop collection '${name}'`);
    await this.milvusService.dropCollection(name);
    this.keywordIndex.reset(name);
  }
}
