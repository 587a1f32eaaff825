import { Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CommentDto, CommentListQueryDto, CourseNameParamDto } from '../dtos';
import { UploadsService } from '../services/uploads.service';

@ApiTags('courses')
@Controller('api/courses')
export class CoursesController {
  constructor(private readonly uploadsService: UploadsService) {}

  @Get(':courseName/comments')
  @ApiOperation({ summary: 'List classified comments across a course' })
  @ApiParam({ name: 'courseName', example: 'Data Science Basics' })
  @ApiResponse({ status: 200, type: [CommentDto] })
  async listComments(
    @Param() params: CourseNameParamDto,
    @Query() query: CommentListQueryDto,
  ): Promise<CommentDto[]> {
    return this.uploadsService.listCourseComments(params.courseName, query);
  }
}
