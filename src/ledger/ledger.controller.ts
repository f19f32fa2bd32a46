import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiForbiddenResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { LedgerService } from './ledger.service';
import { SyncLedgerDto } from './dto/sync-ledger.dto';
import { ToolRunResponseDto } from './dto/tool-run-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';
import { extractActorFromRequest } from '../auth/utils/actor-extractor.util';
import { JwtPayloadType } from '../auth/strategies/types/jwt-payload.type';

/**
 * Ledger Controller
 *
 * Admin-only triggers for the ledger sync tool and the credential
 * network's issuance batch. Tool failures are reported in the body
 * (ok: false), not as HTTP errors.
 */
@ApiTags('Ledger')
@Controller({ path: 'ledger', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles(RoleEnum.admin)
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
@ApiForbiddenResponse({ description: 'Caller is not an administrator' })
export class LedgerController {
  constructor(private readonly ledgerService: LedgerService) {}

  @Post('sync')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Synchronize documents to the ledger',
    description:
      'Syncs one identity when idType and idNumber are given, otherwise every person.',
  })
  @ApiOkResponse({ type: ToolRunResponseDto })
  @ApiBadRequestResponse({ description: 'Only one identity field given' })
  sync(
    @Request() req: ExpressRequest & { user?: JwtPayloadType },
    @Body() dto: SyncLedgerDto,
  ): Promise<ToolRunResponseDto> {
    return this.ledgerService.sync(dto, extractActorFromRequest(req));
  }

  @Post('credentials/issue')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Issue pending verifiable credentials',
  })
  @ApiOkResponse({ type: ToolRunResponseDto })
  issueCredentials(
    @Request() req: ExpressRequest & { user?: JwtPayloadType },
  ): Promise<ToolRunResponseDto> {
    return this.ledgerService.issueCredentials(extractActorFromRequest(req));
  }
}
