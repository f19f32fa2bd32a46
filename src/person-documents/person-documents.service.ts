import { Injectable, NotFoundException } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { PersonDocumentRepositoryPort } from './domain/repositories/person-document.repository.port';
import { PersonDocument } from './domain/entities/person-document.entity';
import { selectLatestFile } from './domain/utils/latest-file.util';
import { DisclosableDocumentResponseDto } from './dto/disclosable-document-response.dto';
import { PersonRepositoryPort } from '../persons/domain/repositories/person.repository.port';

@Injectable()
export class PersonDocumentsService {
  constructor(
    private readonly personDocumentRepository: PersonDocumentRepositoryPort,
    private readonly personRepository: PersonRepositoryPort,
  ) {}

  /**
   * Approved documents of a person, i.e. the ones an organization may request.
   */
  async listDisclosableDocuments(
    personId: number,
  ): Promise<DisclosableDocumentResponseDto[]> {
    const person = await this.personRepository.findById(personId);
    if (!person) {
      throw new NotFoundException(`Person ${personId} not found`);
    }

    const documents =
      await this.personDocumentRepository.findApprovedByPersonId(personId);
    return documents.map((document) => this.toResponseDto(document));
  }

  private toResponseDto(document: PersonDocument): DisclosableDocumentResponseDto {
    const latest = selectLatestFile(document.files);
    return plainToClass(
      DisclosableDocumentResponseDto,
      {
        id: document.id,
        title: document.title,
        issuerEntityId: document.issuerEntityId,
        createdAt: document.createdAt,
        latestFile: latest
          ? {
              id: latest.id,
              originalName: latest.originalName,
              mimeType: latest.mimeType,
              byteSize: latest.byteSize,
              version: latest.version ?? 0,
              uploadedAt: latest.uploadedAt,
            }
          : null,
      },
      { excludeExtraneousValues: true },
    );
  }
}
