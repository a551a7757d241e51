import { ApiProperty } from '@nestjs/swagger';
import { OpinionRequestResponseDto } from './opinion-request-response.dto';
import { OpinionResponseDto } from './opinion-response.dto';

export class OpinionResultResponseDto {
  @ApiProperty({ type: OpinionResponseDto })
  opinion!: OpinionResponseDto;

  @ApiProperty({ type: OpinionRequestResponseDto })
  request!: OpinionRequestResponseDto;
}
