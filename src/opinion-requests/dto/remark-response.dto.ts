import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class RemarkResponseDto {
  @ApiProperty()
  @Expose()
  id!: number;

  @ApiProperty()
  @Expose()
  requestId!: number;

  @ApiProperty()
  @Expose()
  userId!: number;

  @ApiProperty()
  @Expose()
  content!: string;

  @ApiProperty()
  @Expose()
  createdAt!: Date;
}
