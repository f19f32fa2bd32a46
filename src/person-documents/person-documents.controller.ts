import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { PersonDocumentsService } from './person-documents.service';
import { DisclosableDocumentResponseDto } from './dto/disclosable-document-response.dto';
import { Roles } from '../roles/roles.decorator';
import { RoleEnum } from '../roles/roles.enum';
import { RolesGuard } from '../roles/roles.guard';

@ApiTags('Person Documents')
@Controller({ path: 'persons', version: '1' })
@UseGuards(AuthGuard('jwt'), RolesGuard)
@ApiBearerAuth()
export class PersonDocumentsController {
  constructor(private readonly personDocumentsService: PersonDocumentsService) {}

  @Get(':personId/disclosable-documents')
  @Roles(RoleEnum.issuer)
  @ApiOperation({
    summary: 'List documents an organization may request',
    description: 'Only documents whose review is approved are listed.',
  })
  @ApiParam({ name: 'personId', type: Number })
  @ApiOkResponse({ type: [DisclosableDocumentResponseDto] })
  @ApiNotFoundResponse({ description: 'Person not found' })
  listDisclosableDocuments(
    @Param('personId', ParseIntPipe) personId: number,
  ): Promise<DisclosableDocumentResponseDto[]> {
    return this.personDocumentsService.listDisclosableDocuments(personId);
  }
}
