import { Body, Controller, HttpCode, Logger, Post, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { errorMessage } from '../../common/errors';
import { RagPipelineService } from '../pipeline/rag-pipeline.service';
import { AskResponse, EvaluateResponse, SearchResponse } from '../pipeline/pipeline.types';
import { EvaluateDto, QueryDto, SearchDto } from './dto/query.dto';

@ApiTags('query')
@Controller()
export class QueryController {
  private readonly logger = new Logger(QueryController.name);

  constructor(private readonly pipeline: RagPipelineService) { }

  @Post('query')
  @HttpCode(200)
  @ApiOperation({ summary: 'Ask a question', description: 'Retrieves context with the chosen mode and generates an answer.' })
  @ApiResponse({ status: 200, description: 'The answer and its sources.' })
  @ApiResponse({ status: 502, description: 'The reranker or another hosted service failed.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async query(@Body() queryDto: QueryDto): Promise<AskResponse> {
    const requestStart = Date.now();
    this.logger.log(`🌐 HTTP REQUEST: Query received for collection '${queryDto.collection}'`);

    try {
      const response = await this.pipeline.ask(queryDto);
      this.logger.log(`🌐 HTTP RESPONSE: Query completed in ${Date.now() - requestStart}ms`);
      return response;
    } catch (error) {
      this.logger.error(`❌ HTTP ERROR: Query failed after ${Date.now() - requestStart}ms - ${errorMessage(error)}`);
      throw error;
    }
  }

  @Post('search')
  @HttpCode(200)
  @ApiOperation({ summary: 'Retrieve chunks', description: 'Runs retrieval only and returns the ranked chunks.' })
  @ApiResponse({ status: 200, description: 'Ranked chunks, best first.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async search(@Body() searchDto: SearchDto): Promise<SearchResponse> {
    return this.pipeline.search(searchDto);
  }

  @Post('evaluate')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Evaluate the pipeline',
    description: 'Answers each question, then scores the answers against the ground truths with an LLM judge.',
  })
  @ApiResponse({ status: 200, description: 'Mean score per metric and per-question scores.' })
  @ApiResponse({ status: 400, description: 'questions and groundTruths differ in length.' })
  @UsePipes(new ValidationPipe({ transform: true }))
  async evaluate(@Body() evaluateDto: EvaluateDto): Promise<EvaluateResponse> {
    this.logger.log(`🌐 HTTP REQUEST: Evaluate ${evaluateDto.questions.length} questions on '${evaluateDto.collection}'`);
    return this.pipeline.evaluate(evaluateDto);
  }
}
