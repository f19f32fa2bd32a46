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
  Query,
  Request,
  Res,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiGoneResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiProduces,
  ApiServiceUnavailableResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest, Response } from 'express';
import { AccessRequestsService } from './access-requests.service';
import { CreateAccessRequestDto } from './dto/create-access-request.dto';
import { DecideAccessRequestDto } from './dto/decide-access-request.dto';
import { ListAccessRequestsDto } from './dto/list-access-requests.dto';
import { AccessRequestResponseDto } from './dto/access-request-response.dto';
import { LedgerTraceResponseDto } from './dto/ledger-trace-response.dto';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { clientAbortSignal } from '../utils/client-abort-signal';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

type AuthenticatedRequest = ExpressRequest & { user?: JwtPayloadType };

/**
 * Access Requests Controller
 *
 * Authorization Rules:
 * - Create: issuing entities
 * - List / Get: the owner person or the requesting entity
 * - Decide: the owner person only
 * - Content / Trace: the requesting entity, once approved
 * - Admins: denied from all endpoints
 */
@ApiTags('Access Requests')
@Controller({ path: 'access-requests', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class AccessRequestsController {
  constructor(private readonly accessRequestsService: AccessRequestsService) {}

  @Post()
  @Roles(RoleEnum.issuer)
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Request access to documents',
    description:
      'Creates a pending request for approved documents of one person. It expires 15 days after creation.',
  })
  @ApiCreatedResponse({ type: AccessRequestResponseDto })
  @ApiBadRequestResponse({
    description: 'Invalid input, foreign or unapproved document',
  })
  @ApiNotFoundResponse({ description: 'Person or document not found' })
  createRequest(
    @Request() req: AuthenticatedRequest,
    @Body() dto: CreateAccessRequestDto,
  ): Promise<AccessRequestResponseDto> {
    return this.accessRequestsService.createRequest(
      dto,
      extractActorFromRequest(req),
    );
  }

  @Get()
  @Roles(RoleEnum.person, RoleEnum.issuer)
  @ApiOperation({
    summary: 'List access requests',
    description:
      'Persons see requests for their documents, entities see the requests they made. Newest first.',
  })
  @ApiOkResponse({ type: InfinityPaginationResponse(AccessRequestResponseDto) })
  listRequests(
    @Request() req: AuthenticatedRequest,
    @Query() query: ListAccessRequestsDto,
  ): Promise<InfinityPaginationResponseDto<AccessRequestResponseDto>> {
    return this.accessRequestsService.listRequests(
      query,
      extractActorFromRequest(req),
    );
  }

  @Get(':id')
  @Roles(RoleEnum.person, RoleEnum.issuer)
  @ApiOperation({ summary: 'Get an access request' })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: AccessRequestResponseDto })
  @ApiForbiddenResponse({ description: 'Neither owner nor requester' })
  @ApiNotFoundResponse({ description: 'Access request not found' })
  getRequest(
    @Request() req: AuthenticatedRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AccessRequestResponseDto> {
    return this.accessRequestsService.getRequest(
      id,
      extractActorFromRequest(req),
    );
  }

  @Patch(':id/decision')
  @Roles(RoleEnum.person)
  @ApiOperation({
    summary: 'Approve or reject an access request',
    description:
      "Approval first syncs the owner's documents to the ledger and confirms every requested document there.",
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiOkResponse({ type: AccessRequestResponseDto })
  @ApiForbiddenResponse({ description: 'Caller does not own the documents' })
  @ApiConflictResponse({ description: 'Already decided' })
  @ApiGoneResponse({ description: 'Expired' })
  @ApiUnprocessableEntityResponse({
    description: 'A document could not be confirmed on the ledger',
  })
  @ApiServiceUnavailableResponse({ description: 'Ledger tooling failed' })
  decide(
    @Request() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: DecideAccessRequestDto,
  ): Promise<AccessRequestResponseDto> {
    return this.accessRequestsService.decide(
      id,
      dto,
      extractActorFromRequest(req),
      clientAbortSignal(res),
    );
  }

  @Get(':id/documents/:documentId/content')
  @Roles(RoleEnum.issuer)
  @ApiOperation({
    summary: 'Download an approved document',
    description:
      'Streams the latest file of a document in an approved request after re-confirming it on the ledger.',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiParam({ name: 'documentId', type: Number })
  @ApiProduces('application/octet-stream')
  @ApiOkResponse({ description: 'File content' })
  @ApiForbiddenResponse({
    description: 'Not the requester, or document not in the request',
  })
  @ApiConflictResponse({ description: 'Request not approved' })
  @ApiGoneResponse({ description: 'Request expired' })
  async getDocumentContent(
    @Request() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
    @Param('id', ParseIntPipe) id: number,
    @Param('documentId', ParseIntPipe) documentId: number,
  ): Promise<StreamableFile> {
    const handle = await this.accessRequestsService.openApprovedDocument(
      id,
      documentId,
      extractActorFromRequest(req),
      clientAbortSignal(res),
    );

    return new StreamableFile(handle.openStream(), {
      type: handle.mimeType,
      disposition: `inline; filename="${encodeURIComponent(handle.fileName)}"`,
      length: handle.byteSize ?? undefined,
    });
  }

  @Get(':id/documents/:documentId/trace')
  @Roles(RoleEnum.issuer)
  @ApiOperation({
    summary: 'Ledger trace of an approved document',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiParam({ name: 'documentId', type: Number })
  @ApiOkResponse({ type: LedgerTraceResponseDto })
  getDocumentTrace(
    @Request() req: AuthenticatedRequest,
    @Res({ passthrough: true }) res: Response,
    @Param('id', ParseIntPipe) id: number,
    @Param('documentId', ParseIntPipe) documentId: number,
  ): Promise<LedgerTraceResponseDto> {
    return this.accessRequestsService.getDocumentTrace(
      id,
      documentId,
      extractActorFromRequest(req),
      clientAbortSignal(res),
    );
  }
}
