import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class LedgerTraceResponseDto {
  @ApiProperty({ example: 'Hyperledger Fabric' })
  @Expose()
  network!: string;

  @ApiProperty({ description: 'Ledger document id', example: 'a1b2c3' })
  @Expose()
  blockReference!: string;

  @ApiProperty({ example: 'National ID card' })
  @Expose()
  title!: string;

  @ApiProperty({ example: 'National Registry' })
  @Expose()
  issuingEntity!: string;

  @ApiProperty({ example: 'Registered' })
  @Expose()
  status!: string;

  @ApiProperty({ example: '2025-01-20 10:30 UTC' })
  @Expose()
  createdAt!: string;

  @ApiProperty({ example: '1.50 KB' })
  @Expose()
  size!: string;

  @ApiProperty({ example: 'cedula_v2.pdf' })
  @Expose()
  fileName!: string;

  @ApiProperty({ example: 'CC/1020304050/cedula_v2.pdf' })
  @Expose()
  filePath!: string;
}
