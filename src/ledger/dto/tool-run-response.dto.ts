import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class ToolRunResponseDto {
  @ApiProperty({ example: true })
  @Expose()
  ok!: boolean;

  @ApiProperty({ example: 0, description: '-1 when the tool did not complete' })
  @Expose()
  exitCode!: number;

  @ApiPropertyOptional({
    example: 'Error: peer unreachable',
    nullable: true,
    type: String,
  })
  @Expose()
  reason!: string | null;

  @ApiProperty({ example: false })
  @Expose()
  timedOut!: boolean;

  @ApiProperty({ example: 1250 })
  @Expose()
  durationMs!: number;

  @ApiProperty({ description: 'Tool stdout, truncated to 4000 characters' })
  @Expose()
  output!: string;
}
