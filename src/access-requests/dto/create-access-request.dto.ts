import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { MAX_PURPOSE_LENGTH } from '../domain/entities/access-request.entity';

export class CreateAccessRequestDto {
  @ApiProperty({
    description: 'Person whose documents are requested',
    example: 7,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  personId!: number;

  @ApiProperty({
    description: 'Why the organization needs the documents',
    example: 'Employment background verification',
    maxLength: MAX_PURPOSE_LENGTH,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_PURPOSE_LENGTH)
  purpose!: string;

  @ApiProperty({
    description: 'Approved documents of the person to request',
    example: [55, 56],
    type: [Number],
  })
  @IsArray()
  @ArrayNotEmpty()
  @ArrayMaxSize(50)
  @Type(() => Number)
  @IsInt({ each: true })
  @Min(1, { each: true })
  personDocumentIds!: number[];
}
