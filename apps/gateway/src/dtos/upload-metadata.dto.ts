import {
  IsEnum,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { BatchType } from '@app/shared-types';
import { trimString } from './dto.transforms';

/**
 * Form fields sent alongside the survey file
 */
export class UploadMetadataDto {
  @ApiProperty({ description: 'Course name', example: 'Data Science Basics' })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty({ message: 'courseName is required' })
  @MaxLength(200, { message: 'courseName cannot exceed 200 characters' })
  courseName!: string;

  @ApiProperty({ description: 'Lecture date (YYYY-MM-DD)', example: '2024-05-01' })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'lectureDate must be YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'lectureDate must be a valid date' })
  lectureDate!: string;

  @ApiProperty({ description: 'Lecture number within the course', example: 1 })
  @IsInt()
  @Min(1)
  lectureNumber!: number;

  @ApiPropertyOptional({
    description: 'Preliminary uploads are superseded by confirmed ones',
    enum: BatchType,
    default: BatchType.PRELIMINARY,
  })
  @IsOptional()
  @IsEnum(BatchType)
  batchType?: BatchType;
}
