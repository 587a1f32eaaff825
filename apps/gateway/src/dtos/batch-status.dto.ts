import { ApiProperty } from '@nestjs/swagger';
import { BatchStatus, BatchType } from '@app/shared-types';

export class BatchStatusDto {
  @ApiProperty({ example: '550e8400-e29b-41d4-a716-446655440000' })
  file_id!: string;

  @ApiProperty({ enum: BatchStatus, example: BatchStatus.QUEUED })
  status!: BatchStatus;

  @ApiProperty({ example: 'Data Science Basics' })
  course_name!: string;

  @ApiProperty({ example: '2024-05-01' })
  lecture_date!: string;

  @ApiProperty({ example: 1 })
  lecture_number!: number;

  @ApiProperty({ enum: BatchType, example: BatchType.PRELIMINARY })
  batch_type!: BatchType;

  @ApiProperty()
  total_responses!: number;

  @ApiProperty()
  total_comments!: number;

  @ApiProperty()
  processed_comments!: number;

  @ApiProperty({ type: String, nullable: true })
  error_message!: string | null;

  @ApiProperty()
  uploaded_at!: Date;

  @ApiProperty({ type: Date, nullable: true })
  processing_started_at!: Date | null;

  @ApiProperty({ type: Date, nullable: true })
  completed_at!: Date | null;
}
