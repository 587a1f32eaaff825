import { ApiProperty } from '@nestjs/swagger';
import {
  AnalysisStatus,
  CommentCategory,
  ImportanceLevel,
  QuestionType,
  SentimentLabel,
} from '@app/shared-types';

/**
 * One classified comment cell
 */
export class CommentDto {
  @ApiProperty()
  comment_id!: string;

  @ApiProperty({ description: 'Batch the comment belongs to' })
  file_id!: string;

  @ApiProperty({ type: String, nullable: true })
  response_id!: string | null;

  @ApiProperty({ example: '（任意）本日の講義で学んだこと' })
  question_label!: string;

  @ApiProperty({ enum: QuestionType })
  question_type!: QuestionType;

  @ApiProperty()
  comment_text!: string;

  @ApiProperty({ enum: CommentCategory })
  category!: CommentCategory;

  @ApiProperty({ enum: SentimentLabel })
  sentiment!: SentimentLabel;

  @ApiProperty({ enum: ImportanceLevel })
  importance_level!: ImportanceLevel;

  @ApiProperty({ minimum: 0, maximum: 1 })
  importance_score!: number;

  @ApiProperty({ example: 'none' })
  risk_level!: string;

  @ApiProperty()
  is_safe!: boolean;

  @ApiProperty()
  is_improvement_needed!: boolean;

  @ApiProperty({ type: String, nullable: true })
  summary!: string | null;

  @ApiProperty({ type: [String] })
  tags!: string[];

  @ApiProperty({ enum: AnalysisStatus })
  analysis_status!: AnalysisStatus;

  @ApiProperty()
  analyzed_at!: Date;
}
