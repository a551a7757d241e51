import { ApiProperty } from '@nestjs/swagger';
import { OpinionRequestResponseDto } from './opinion-request-response.dto';
import { RequestDocumentResponseDto } from './request-document-response.dto';

export class DocumentsUploadResponseDto {
  @ApiProperty({ type: OpinionRequestResponseDto })
  request!: OpinionRequestResponseDto;

  @ApiProperty({ type: [RequestDocumentResponseDto] })
  documents!: RequestDocumentResponseDto[];
}
