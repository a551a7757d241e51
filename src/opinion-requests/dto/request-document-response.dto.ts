import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class RequestDocumentResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty()
  @Expose()
  requestId!: number;

  @ApiProperty({ example: 'budget-2024.xlsx' })
  @Expose()
  fileName!: string;

  @ApiProperty({ example: 'xlsx' })
  @Expose()
  fileType!: string;

  @ApiProperty()
  @Expose()
  fileSize!: number;

  @ApiProperty()
  @Expose()
  uploadedBy!: number;

  @ApiPropertyOptional({ type: String, nullable: true })
  @Expose()
  remarks!: string | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  // Storage paths stay server side
}
