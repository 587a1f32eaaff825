import { IsInt, IsNotEmpty, IsString, Min } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { trimString } from './dto.transforms';

export class LectureQueryDto {
  @ApiProperty({ example: 'Data Science Basics' })
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  courseName!: string;

  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  lectureNumber!: number;
}
