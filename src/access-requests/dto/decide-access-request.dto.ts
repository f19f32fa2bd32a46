import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { MAX_DECISION_NOTE_LENGTH } from '../domain/entities/access-request.entity';

export class DecideAccessRequestDto {
  @ApiProperty({
    description: 'true to approve, false to reject',
    example: true,
  })
  @IsBoolean()
  approve!: boolean;

  @ApiPropertyOptional({
    description: 'Optional note stored with the decision',
    example: 'Approved for this hiring process only',
    maxLength: MAX_DECISION_NOTE_LENGTH,
  })
  @IsString()
  @MaxLength(MAX_DECISION_NOTE_LENGTH)
  @IsOptional()
  note?: string;
}
