import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';
import { AccessRequestStatus } from '../domain/enums/access-request-status.enum';

export class AccessRequestItemResponseDto {
  @ApiProperty({ example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 55 })
  @Expose()
  personDocumentId!: number;

  @ApiPropertyOptional({ example: 'National ID card', nullable: true, type: String })
  @Expose()
  documentTitle!: string | null;
}

/**
 * Access Request Response DTO
 *
 * Purpose and note are shown to both parties; identity numbers never are.
 */
export class AccessRequestResponseDto {
  @ApiProperty({ description: 'Access request ID', example: 11 })
  @Expose()
  id!: number;

  @ApiProperty({ description: 'Requesting organization ID', example: 3 })
  @Expose()
  requesterEntityId!: number;

  @ApiProperty({ description: 'Document owner (person) ID', example: 7 })
  @Expose()
  ownerPersonId!: number;

  @ApiProperty({ example: 'Employment background verification' })
  @Expose()
  purpose!: string;

  @ApiProperty({ enum: AccessRequestStatus, example: AccessRequestStatus.PENDING })
  @Expose()
  status!: AccessRequestStatus;

  @ApiProperty({ example: '2025-01-20T10:00:00.000Z' })
  @Expose()
  requestedAt!: Date;

  @ApiPropertyOptional({ example: null, nullable: true, type: Date })
  @Expose()
  decidedAt!: Date | null;

  @ApiProperty({ example: '2025-02-04T10:00:00.000Z' })
  @Expose()
  expiresAt!: Date;

  @ApiPropertyOptional({ example: null, nullable: true, type: String })
  @Expose()
  decisionNote!: string | null;

  @ApiProperty({ type: [AccessRequestItemResponseDto] })
  @Expose()
  @Type(() => AccessRequestItemResponseDto)
  items!: AccessRequestItemResponseDto[];
}
