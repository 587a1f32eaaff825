import { Transform } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { CommentCategory, SentimentLabel } from '@app/shared-types';
import { trimString } from './dto.transforms';

export const DEFAULT_COMMENT_PAGE_SIZE = 100;
export const MAX_COMMENT_PAGE_SIZE = 500;

/**
 * Paging and label filters for comment listings
 */
export class CommentListQueryDto {
  @ApiPropertyOptional({
    minimum: 1,
    maximum: MAX_COMMENT_PAGE_SIZE,
    default: DEFAULT_COMMENT_PAGE_SIZE,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_COMMENT_PAGE_SIZE)
  limit?: number;

  @ApiPropertyOptional({ minimum: 0, default: 0 })
  @IsOptional()
  @IsInt()
  @Min(0)
  skip?: number;

  @ApiPropertyOptional({ enum: SentimentLabel })
  @IsOptional()
  @IsEnum(SentimentLabel)
  sentiment?: SentimentLabel;

  @ApiPropertyOptional({ enum: CommentCategory })
  @IsOptional()
  @IsEnum(CommentCategory)
  category?: CommentCategory;
}

export class CourseNameParamDto {
  @Transform(trimString)
  @IsString()
  @IsNotEmpty({ message: 'courseName is required' })
  courseName!: string;
}
