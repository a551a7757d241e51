import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { CommunicationResponseDto } from './communication-response.dto';
import { OpinionRequestResponseDto } from './opinion-request-response.dto';
import { RequestAssignmentResponseDto } from './request-assignment-response.dto';

export class AssignmentResultResponseDto {
  @ApiProperty({ type: OpinionRequestResponseDto })
  request!: OpinionRequestResponseDto;

  @ApiProperty({ type: RequestAssignmentResponseDto })
  assignment!: RequestAssignmentResponseDto;

  @ApiPropertyOptional({
    type: CommunicationResponseDto,
    nullable: true,
    description: 'Set when the assignment crosses department boundaries',
  })
  communication!: CommunicationResponseDto | null;
}
