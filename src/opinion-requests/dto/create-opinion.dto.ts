import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

export class CreateOpinionDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  requestId!: number;

  @ApiProperty({ example: 3 })
  @IsInt()
  @Min(1)
  departmentId!: number;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  content!: string;

  @ApiPropertyOptional({ type: String, nullable: true })
  @IsOptional()
  @IsString()
  recommendation?: string | null;
}
