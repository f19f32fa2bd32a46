import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { AccessRequestStatus } from '../domain/enums/access-request-status.enum';

export class ListAccessRequestsDto {
  @ApiPropertyOptional({
    description: 'Filter by status',
    enum: AccessRequestStatus,
    example: AccessRequestStatus.PENDING,
  })
  @IsEnum(AccessRequestStatus)
  @IsOptional()
  status?: AccessRequestStatus;

  @ApiPropertyOptional({
    description: 'Page number (1-indexed)',
    example: 1,
    default: 1,
    minimum: 1,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  page?: number;

  @ApiPropertyOptional({
    description: 'Items per page',
    example: 20,
    default: 20,
    minimum: 1,
    maximum: 100,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number;
}
