import { ApiProperty } from '@nestjs/swagger';
import { SummaryAnalysisType } from '@app/shared-types';
import type { SurveySummary } from '@app/database';
import { BatchStatusDto } from './batch-status.dto';

/** Label -> count for each histogram */
export type CommentHistograms = Record<SummaryAnalysisType, Record<string, number>>;

export class SummaryResponseDto {
  @ApiProperty()
  file_id!: string;

  @ApiProperty({ description: 'Segment the summary covers', example: 'ALL' })
  student_attribute!: string;

  @ApiProperty({
    description: 'Averages and NPS; null until the batch has been processed',
    nullable: true,
  })
  survey!: SurveySummary | null;

  @ApiProperty({
    description: 'Comment counts by sentiment, category and importance',
    example: {
      sentiment: { positive: 3, neutral: 1, negative: 0 },
      category: { content: 2, materials: 1, operations: 0, instructor: 1, other: 0 },
      importance: { low: 2, medium: 1, high: 1 },
    },
  })
  comments!: CommentHistograms;
}

export class EffectiveLectureDto {
  @ApiProperty({ type: BatchStatusDto })
  batch!: BatchStatusDto;

  @ApiProperty({ type: SummaryResponseDto })
  summary!: SummaryResponseDto;
}

export class RecomputeResponseDto {
  @ApiProperty()
  file_id!: string;

  @ApiProperty({ example: 'Summary recomputation has been queued.' })
  message!: string;
}
