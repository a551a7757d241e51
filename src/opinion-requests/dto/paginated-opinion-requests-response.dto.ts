import { ApiProperty } from '@nestjs/swagger';
import { OpinionRequestResponseDto } from './opinion-request-response.dto';

export class PaginatedOpinionRequestsResponseDto {
  @ApiProperty({ type: [OpinionRequestResponseDto] })
  data!: OpinionRequestResponseDto[];

  @ApiProperty()
  total!: number;

  @ApiProperty()
  skip!: number;

  @ApiProperty()
  limit!: number;

  @ApiProperty()
  hasNextPage!: boolean;
}
