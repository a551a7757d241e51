import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { CreateOpinionDto } from './dto/create-opinion.dto';
import { OpinionResponseDto } from './dto/opinion-response.dto';
import { OpinionResultResponseDto } from './dto/opinion-result-response.dto';
import { ReviewOpinionDto } from './dto/review-opinion.dto';
import { UpdateOpinionDto } from './dto/update-opinion.dto';
import { OpinionRequestsService } from './opinion-requests.service';

@ApiTags('Opinions')
@Controller({ path: 'opinions', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class OpinionsController {
  constructor(private readonly service: OpinionRequestsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Write a draft opinion',
    description:
      'The caller needs an assignment on the request for the given department.',
  })
  @ApiCreatedResponse({ type: OpinionResultResponseDto })
  @ApiForbiddenResponse({ description: 'No matching assignment' })
  createOpinion(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    return this.service.createOpinion(extractActorFromRequest(req), dto);
  }

  @Get(':id')
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionResponseDto })
  @ApiNotFoundResponse({ description: 'Opinion not found' })
  getOpinion(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<OpinionResponseDto> {
    return this.service.getOpinion(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Edit a draft opinion' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionResultResponseDto })
  @ApiBadRequestResponse({ description: 'Opinion is no longer a draft' })
  @ApiForbiddenResponse({ description: 'Only the author can edit' })
  updateOpinion(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    return this.service.updateOpinion(id, extractActorFromRequest(req), dto);
  }

  @Post(':id/submit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Submit a draft opinion for head review' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionResultResponseDto })
  @ApiBadRequestResponse({ description: 'Only draft opinions can be submitted' })
  @ApiForbiddenResponse({ description: 'Only the author can submit' })
  submitOpinion(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<OpinionResultResponseDto> {
    return this.service.submitOpinion(id, extractActorFromRequest(req));
  }

  @Post(':id/review')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Approve or reject a submitted opinion' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionResultResponseDto })
  @ApiBadRequestResponse({ description: 'Opinion is not submitted' })
  @ApiForbiddenResponse({
    description: 'Missing approve_opinion_requests permission',
  })
  reviewOpinion(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ReviewOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    return this.service.reviewOpinion(id, extractActorFromRequest(req), dto);
  }
}
