import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, Type } from 'class-transformer';

export class LatestFileResponseDto {
  @ApiProperty({ example: 91 })
  @Expose()
  id!: number;

  @ApiPropertyOptional({ example: 'cedula.pdf', nullable: true, type: String })
  @Expose()
  originalName!: string | null;

  @ApiPropertyOptional({ example: 'application/pdf', nullable: true, type: String })
  @Expose()
  mimeType!: string | null;

  @ApiPropertyOptional({ example: 204800, nullable: true, type: Number })
  @Expose()
  byteSize!: number | null;

  @ApiProperty({ example: 2 })
  @Expose()
  version!: number;

  @ApiProperty({ example: '2025-01-15T09:30:00.000Z' })
  @Expose()
  uploadedAt!: Date;
}

/**
 * A document an organization may include in an access request.
 * Storage paths and hashes stay server-side.
 */
export class DisclosableDocumentResponseDto {
  @ApiProperty({ example: 55 })
  @Expose()
  id!: number;

  @ApiPropertyOptional({ example: 'National ID card', nullable: true, type: String })
  @Expose()
  title!: string | null;

  @ApiPropertyOptional({ example: 3, nullable: true, type: Number })
  @Expose()
  issuerEntityId!: number | null;

  @ApiProperty({ example: '2025-01-10T08:00:00.000Z' })
  @Expose()
  createdAt!: Date;

  @ApiPropertyOptional({ type: LatestFileResponseDto, nullable: true })
  @Expose()
  @Type(() => LatestFileResponseDto)
  latestFile!: LatestFileResponseDto | null;
}
