import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBody,
  ApiConsumes,
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { USER_ID_HEADER, sanitizeForLog } from '@app/shared-types';
import { CorrelationId } from '../decorators/correlation-id.decorator';
import {
  BatchStatusDto,
  CommentDto,
  CommentListQueryDto,
  RecomputeResponseDto,
  SummaryResponseDto,
  UploadMetadataDto,
  UploadResponseDto,
} from '../dtos';
import { UploadedSurveyFile, UploadsService } from '../services/uploads.service';

export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

@ApiTags('uploads')
@Controller('api/uploads')
export class UploadsController {
  private readonly logger = new Logger(UploadsController.name);

  constructor(private readonly uploadsService: UploadsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(
    FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }),
  )
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      required: ['file', 'courseName', 'lectureDate', 'lectureNumber'],
      properties: {
        file: { type: 'string', format: 'binary' },
        courseName: { type: 'string' },
        lectureDate: { type: 'string', format: 'date' },
        lectureNumber: { type: 'integer', minimum: 1 },
        batchType: { type: 'string', enum: ['preliminary', 'confirmed'] },
      },
    },
  })
  @ApiHeader({ name: USER_ID_HEADER, required: false })
  @ApiOperation({ summary: 'Upload a lecture survey CSV for analysis' })
  @ApiResponse({ status: 201, type: UploadResponseDto })
  @ApiResponse({ status: 400, description: 'Empty or invalid CSV' })
  @ApiResponse({ status: 409, description: 'Lecture already has a batch of this type' })
  async upload(
    @UploadedFile() file: UploadedSurveyFile | undefined,
    @Body() metadata: UploadMetadataDto,
    @Headers(USER_ID_HEADER) uploadedBy: string | undefined,
    @CorrelationId() correlationId: string,
  ): Promise<UploadResponseDto> {
    this.logger.log(
      `[${correlationId}] Upload received: ${sanitizeForLog(file?.originalname ?? '(no file)')}`,
    );

    return this.uploadsService.upload(
      file,
      metadata,
      uploadedBy || null,
      correlationId,
    );
  }

  @Get()
  @ApiOperation({ summary: 'List uploaded batches, newest first' })
  @ApiResponse({ status: 200, type: [BatchStatusDto] })
  async list(): Promise<BatchStatusDto[]> {
    return this.uploadsService.listBatches();
  }

  @Get(':id/status')
  @ApiOperation({ summary: 'Get processing status of a batch' })
  @ApiParam({ name: 'id', description: 'Batch UUID' })
  @ApiResponse({ status: 200, type: BatchStatusDto })
  @ApiResponse({ status: 404, description: 'Batch not found' })
  async getStatus(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<BatchStatusDto> {
    return this.uploadsService.getStatus(id);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a batch, its derived rows and its file' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 404, description: 'Batch not found' })
  async remove(
    @Param('id', ParseUUIDPipe) id: string,
    @CorrelationId() correlationId: string,
  ): Promise<void> {
    await this.uploadsService.deleteBatch(id, correlationId);
  }

  @Get(':id/summary')
  @ApiOperation({ summary: 'Get the ALL-students summary of a batch' })
  @ApiResponse({ status: 200, type: SummaryResponseDto })
  @ApiResponse({ status: 404, description: 'Batch not found' })
  async getSummary(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<SummaryResponseDto> {
    return this.uploadsService.getSummary(id);
  }

  @Get(':id/comments')
  @ApiOperation({ summary: 'List the classified comments of a batch' })
  @ApiResponse({ status: 200, type: [CommentDto] })
  @ApiResponse({ status: 404, description: 'Batch not found' })
  async listComments(
    @Param('id', ParseUUIDPipe) id: string,
    @Query() query: CommentListQueryDto,
  ): Promise<CommentDto[]> {
    return this.uploadsService.listBatchComments(id, query);
  }

  @Post(':id/summary/recompute')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Queue a recomputation of the batch summaries' })
  @ApiResponse({ status: 202, type: RecomputeResponseDto })
  @ApiResponse({ status: 404, description: 'Batch not found' })
  async recompute(
    @Param('id', ParseUUIDPipe) id: string,
    @CorrelationId() correlationId: string,
  ): Promise<RecomputeResponseDto> {
    return this.uploadsService.requestRecompute(id, correlationId);
  }
}
