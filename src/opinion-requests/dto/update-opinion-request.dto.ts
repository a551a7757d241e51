import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsDate,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { RequestPriority } from '../domain/enums/request-priority.enum';
import { OpinionRequestSectionsDto } from './opinion-request-sections.dto';

const isPresent = (_: object, value: unknown) => value !== undefined;

/**
 * Partial update. Absent fields are left alone; fields sent as null are
 * cleared, except the ones a request cannot be without.
 */
export class UpdateOpinionRequestDto extends OpinionRequestSectionsDto {
  @ApiPropertyOptional({ maxLength: 255 })
  @ValidateIf(isPresent)
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  title?: string;

  @ApiPropertyOptional({ type: String, nullable: true })
  @IsOptional()
  @IsString()
  description?: string | null;

  @ApiPropertyOptional()
  @ValidateIf(isPresent)
  @IsInt()
  @Min(1)
  departmentId?: number;

  @ApiPropertyOptional()
  @ValidateIf(isPresent)
  @IsInt()
  @Min(1)
  categoryId?: number;

  @ApiPropertyOptional({ type: Number, nullable: true })
  @IsOptional()
  @IsInt()
  @Min(1)
  subcategoryId?: number | null;

  @ApiPropertyOptional({ enum: RequestPriority })
  @ValidateIf(isPresent)
  @IsEnum(RequestPriority)
  priority?: RequestPriority;

  @ApiPropertyOptional({ type: Date, nullable: true })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  dueDate?: Date | null;

  @ApiPropertyOptional({
    description:
      'Version the client last read. The update is refused with 409 when the request has moved on.',
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  expectedVersion?: number;
}
