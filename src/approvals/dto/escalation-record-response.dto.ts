import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class EscalationRecordResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty()
  @Expose()
  cycleId!: string;

  @ApiProperty({ example: 1 })
  @Expose()
  depth!: number;

  @ApiProperty({ example: 'lead-1' })
  @Expose()
  escalatedToId!: string;

  @ApiProperty({ type: [String], example: ['reviewer-2'] })
  @Expose()
  escalatedFromIds!: string[];

  @ApiProperty()
  @Expose()
  triggeredAt!: Date;

  @ApiProperty({ example: 24 })
  @Expose()
  timeoutHours!: number;
}
