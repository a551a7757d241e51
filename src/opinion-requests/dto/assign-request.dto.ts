import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDate,
  IsInt,
  IsOptional,
  IsString,
  Min,
} from 'class-validator';

export class AssignRequestDto {
  @ApiProperty({ example: 3 })
  @IsInt()
  @Min(1)
  departmentId!: number;

  @ApiPropertyOptional({
    type: Number,
    nullable: true,
    description: 'Leave out to assign the department as a whole',
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  expertId?: number | null;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  dueDate?: Date | null;

  @ApiPropertyOptional({
    description:
      'Always true when the request has no primary assignment yet; defaults to false otherwise',
  })
  @IsOptional()
  @IsBoolean()
  isPrimary?: boolean;

  @ApiPropertyOptional({ type: String, nullable: true })
  @IsOptional()
  @IsString()
  remarks?: string | null;
}
