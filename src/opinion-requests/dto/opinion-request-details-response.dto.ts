import { ApiProperty } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { CommunicationResponseDto } from './communication-response.dto';
import { OpinionRequestResponseDto } from './opinion-request-response.dto';
import { OpinionResponseDto } from './opinion-response.dto';
import { RemarkResponseDto } from './remark-response.dto';
import { RequestAssignmentResponseDto } from './request-assignment-response.dto';
import { RequestDocumentResponseDto } from './request-document-response.dto';

export class OpinionRequestDetailsResponseDto extends OpinionRequestResponseDto {
  @ApiProperty({ type: [RequestAssignmentResponseDto] })
  @Expose()
  @Type(() => RequestAssignmentResponseDto)
  assignments!: RequestAssignmentResponseDto[];

  @ApiProperty({ type: [OpinionResponseDto] })
  @Expose()
  @Type(() => OpinionResponseDto)
  opinions!: OpinionResponseDto[];

  @ApiProperty({ type: [RequestDocumentResponseDto] })
  @Expose()
  @Type(() => RequestDocumentResponseDto)
  documents!: RequestDocumentResponseDto[];

  @ApiProperty({ type: [RemarkResponseDto] })
  @Expose()
  @Type(() => RemarkResponseDto)
  remarks!: RemarkResponseDto[];

  @ApiProperty({ type: [CommunicationResponseDto] })
  @Expose()
  @Type(() => CommunicationResponseDto)
  communications!: CommunicationResponseDto[];
}
