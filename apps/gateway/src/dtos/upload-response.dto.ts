import { ApiProperty } from '@nestjs/swagger';

export class UploadResponseDto {
  @ApiProperty({ example: '550e8400-e29b-41d4-a716-446655440000' })
  file_id!: string;

  @ApiProperty({ example: '/api/uploads/550e8400-e29b-41d4-a716-446655440000/status' })
  status_url!: string;

  @ApiProperty({ example: 'Upload accepted; analysis has been queued.' })
  message!: string;
}
