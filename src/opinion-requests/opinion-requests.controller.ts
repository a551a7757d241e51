import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  Request,
  StreamableFile,
  UploadedFiles,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { FilesInterceptor } from '@nestjs/platform-express';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiConsumes,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuthenticatedRequest } from '../auth/strategies/types/jwt-payload.type';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { AddRemarkDto } from './dto/add-remark.dto';
import { AssignRequestDto } from './dto/assign-request.dto';
import { AssignmentResultResponseDto } from './dto/assignment-result-response.dto';
import { ChangeStatusDto } from './dto/change-status.dto';
import { CreateOpinionRequestDto } from './dto/create-opinion-request.dto';
import { DocumentsUploadResponseDto } from './dto/documents-upload-response.dto';
import { OpinionRequestDetailsResponseDto } from './dto/opinion-request-details-response.dto';
import { OpinionRequestListQueryDto } from './dto/opinion-request-list-query.dto';
import { OpinionRequestResponseDto } from './dto/opinion-request-response.dto';
import { OpinionResponseDto } from './dto/opinion-response.dto';
import { PaginatedOpinionRequestsResponseDto } from './dto/paginated-opinion-requests-response.dto';
import { ReassignRequestDto } from './dto/reassign-request.dto';
import { RemarkResponseDto } from './dto/remark-response.dto';
import { UpdateOpinionRequestDto } from './dto/update-opinion-request.dto';
import { UploadDocumentsDto } from './dto/upload-documents.dto';
import { WorkflowHistoryResponseDto } from './dto/workflow-history-response.dto';
import { OpinionRequestsService } from './opinion-requests.service';
import { toIncomingFiles } from './utils/incoming-file.util';

const MAX_FILES_PER_UPLOAD = 20;

/**
 * Opinion Requests Controller
 *
 * Every route needs a valid JWT. Authorization beyond that (requester,
 * permissions, assignments) is decided by the workflow services.
 */
@ApiTags('Opinion Requests')
@Controller({ path: 'opinion-requests', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class OpinionRequestsController {
  constructor(private readonly service: OpinionRequestsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({ summary: 'Create an opinion request' })
  @ApiConsumes('multipart/form-data', 'application/json')
  @ApiBody({ type: CreateOpinionRequestDto })
  @ApiCreatedResponse({ type: OpinionRequestDetailsResponseDto })
  @ApiBadRequestResponse({
    description: 'Unknown department or category, or a rejected file',
  })
  @UseInterceptors(
    FilesInterceptor('files', MAX_FILES_PER_UPLOAD),
  )
  createRequest(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateOpinionRequestDto,
    @UploadedFiles() files: Express.Multer.File[] | undefined,
  ): Promise<OpinionRequestDetailsResponseDto> {
    return this.service.createRequest(
      extractActorFromRequest(req),
      dto,
      toIncomingFiles(files),
    );
  }

  @Get()
  @ApiOperation({
    summary: 'List opinion requests',
    description: 'Newest first. `limit` is capped at 100.',
  })
  @ApiOkResponse({ type: PaginatedOpinionRequestsResponseDto })
  listRequests(
    @Query() query: OpinionRequestListQueryDto,
  ): Promise<PaginatedOpinionRequestsResponseDto> {
    return this.service.listRequests(query);
  }

  @Patch('assignments/:assignmentId')
  @ApiOperation({ summary: 'Replace the expert on an assignment' })
  @ApiParam({ name: 'assignmentId', type: Number })
  @ApiOkResponse({ type: AssignmentResultResponseDto })
  @ApiBadRequestResponse({
    description: 'Expert unknown, inactive or outside the department',
  })
  @ApiForbiddenResponse({ description: 'Missing assign_experts permission' })
  @ApiNotFoundResponse({ description: 'Assignment not found' })
  reassignRequest(
    @Request() req: AuthenticatedRequest,
    @Param('assignmentId', ParseIntPipe) assignmentId: number,
    @Body() dto: ReassignRequestDto,
  ): Promise<AssignmentResultResponseDto> {
    return this.service.reassignRequest(
      assignmentId,
      extractActorFromRequest(req),
      dto,
    );
  }

  @Get('documents/:documentId/download')
  @ApiOperation({ summary: 'Download a request document' })
  @ApiParam({ name: 'documentId', type: Number })
  @ApiOkResponse({ description: 'File contents' })
  @ApiNotFoundResponse({ description: 'Document not found' })
  async downloadDocument(
    @Request() req: AuthenticatedRequest,
    @Param('documentId', ParseIntPipe) documentId: number,
  ): Promise<StreamableFile> {
    const download = await this.service.downloadDocument(
      documentId,
      extractActorFromRequest(req),
    );
    return new StreamableFile(download.stream, {
      type: 'application/octet-stream',
      disposition: `attachment; filename="${encodeURIComponent(download.fileName)}"`,
      length: download.fileSize,
    });
  }

  @Delete('documents/:documentId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a request document' })
  @ApiParam({ name: 'documentId', type: Number })
  @ApiNoContentResponse({ description: 'Document deleted' })
  @ApiForbiddenResponse({
    description: 'Only the uploader or a document manager can delete',
  })
  @ApiNotFoundResponse({ description: 'Document not found' })
  deleteDocument(
    @Request() req: AuthenticatedRequest,
    @Param('documentId', ParseIntPipe) documentId: number,
  ): Promise<void> {
    return this.service.deleteDocument(documentId, extractActorFromRequest(req));
  }

  @Get(':id')
  @ApiOperation({
    summary: 'Get an opinion request',
    description:
      'Includes assignments, opinions, documents, remarks and interdepartmental communications.',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionRequestDetailsResponseDto })
  @ApiNotFoundResponse({ description: 'Opinion request not found' })
  getRequest(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<OpinionRequestDetailsResponseDto> {
    return this.service.getRequest(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update an opinion request' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionRequestResponseDto })
  @ApiForbiddenResponse({
    description: 'Only the requester or a request manager can update',
  })
  @ApiConflictResponse({ description: 'expectedVersion is stale' })
  updateRequest(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateOpinionRequestDto,
  ): Promise<OpinionRequestResponseDto> {
    return this.service.updateRequest(id, extractActorFromRequest(req), dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Soft delete an opinion request' })
  @ApiParam({ name: 'id', type: Number })
  @ApiNoContentResponse({ description: 'Opinion request deleted' })
  @ApiForbiddenResponse({
    description: 'Only the requester or a request manager can delete',
  })
  deleteRequest(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.service.deleteRequest(id, extractActorFromRequest(req));
  }

  @Post(':id/assignments')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Assign a request to a department or expert' })
  @ApiParam({ name: 'id', type: Number })
  @ApiCreatedResponse({ type: AssignmentResultResponseDto })
  @ApiBadRequestResponse({
    description: 'Unknown department, or expert outside the department',
  })
  @ApiForbiddenResponse({ description: 'Missing assign_experts permission' })
  assignRequest(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AssignRequestDto,
  ): Promise<AssignmentResultResponseDto> {
    return this.service.assignRequest(id, extractActorFromRequest(req), dto);
  }

  @Patch(':id/status')
  @ApiOperation({
    summary: 'Move a request along a side branch or into head review',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: OpinionRequestResponseDto })
  @ApiBadRequestResponse({ description: 'Transition not allowed' })
  changeStatus(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: ChangeStatusDto,
  ): Promise<OpinionRequestResponseDto> {
    return this.service.changeStatus(id, extractActorFromRequest(req), dto);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Workflow history in creation order' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: [WorkflowHistoryResponseDto] })
  getHistory(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<WorkflowHistoryResponseDto[]> {
    return this.service.getHistory(id);
  }

  @Get(':id/opinions')
  @ApiOperation({ summary: 'Opinions written for a request' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: [OpinionResponseDto] })
  listOpinions(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<OpinionResponseDto[]> {
    return this.service.listOpinions(id);
  }

  @Post(':id/remarks')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a remark' })
  @ApiParam({ name: 'id', type: Number })
  @ApiCreatedResponse({ type: RemarkResponseDto })
  addRemark(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: AddRemarkDto,
  ): Promise<RemarkResponseDto> {
    return this.service.addRemark(id, extractActorFromRequest(req), dto);
  }

  @Post(':id/documents')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Upload documents',
    description:
      'All or nothing: one rejected file rejects the whole batch.',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        files: {
          type: 'array',
          items: { type: 'string', format: 'binary' },
        },
        remarks: { type: 'string', maxLength: 1000 },
      },
      required: ['files'],
    },
  })
  @ApiCreatedResponse({ type: DocumentsUploadResponseDto })
  @ApiBadRequestResponse({ description: 'File type or size not allowed' })
  @UseInterceptors(FilesInterceptor('files', MAX_FILES_PER_UPLOAD))
  uploadDocuments(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UploadDocumentsDto,
    @UploadedFiles() files: Express.Multer.File[] | undefined,
  ): Promise<DocumentsUploadResponseDto> {
    return this.service.uploadDocuments(
      id,
      extractActorFromRequest(req),
      toIncomingFiles(files),
      dto.remarks,
    );
  }
}
