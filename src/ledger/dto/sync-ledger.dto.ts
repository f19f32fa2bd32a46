import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { IdType } from '../../persons/domain/enums/id-type.enum';

/**
 * Body of POST /ledger/sync.
 * Both identity fields sync one person; neither syncs everything.
 */
export class SyncLedgerDto {
  @ApiPropertyOptional({ enum: IdType, example: IdType.CC })
  @IsEnum(IdType)
  @IsOptional()
  idType?: IdType;

  @ApiPropertyOptional({ example: '1020304050' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(40)
  @IsOptional()
  idNumber?: string;
}
