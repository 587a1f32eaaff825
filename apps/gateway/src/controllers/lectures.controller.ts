import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { EffectiveLectureDto, LectureQueryDto } from '../dtos';
import { UploadsService } from '../services/uploads.service';

@ApiTags('lectures')
@Controller('api/lectures')
export class LecturesController {
  constructor(private readonly uploadsService: UploadsService) {}

  /**
   * Latest confirmed batch of the lecture, else its latest batch
   */
  @Get('effective')
  @ApiOperation({ summary: 'Get the batch that represents a lecture' })
  @ApiResponse({ status: 200, type: EffectiveLectureDto })
  @ApiResponse({ status: 404, description: 'No batch for this lecture' })
  async getEffective(
    @Query() query: LectureQueryDto,
  ): Promise<EffectiveLectureDto> {
    return this.uploadsService.getEffectiveLecture(
      query.courseName,
      query.lectureNumber,
    );
  }
}
