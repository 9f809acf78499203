import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DecisionVerdict } from '../domain/enums/decision-verdict.enum';

export class DecisionResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty()
  @Expose()
  cycleId!: string;

  @ApiProperty({
    description: 'Reviewer whose obligation the decision satisfies',
    example: 'reviewer-1',
  })
  @Expose()
  reviewerId!: string;

  @ApiProperty({
    description: 'Who actually decided; a substitute when delegated',
    example: 'reviewer-3',
  })
  @Expose()
  actingActorId!: string;

  @ApiProperty({ enum: DecisionVerdict })
  @Expose()
  verdict!: DecisionVerdict;

  @ApiProperty({ nullable: true, example: null })
  @Expose()
  reason!: string | null;

  @ApiProperty()
  @Expose()
  decidedAt!: Date;
}
