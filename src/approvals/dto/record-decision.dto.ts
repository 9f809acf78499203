import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { DecisionVerdict } from '../domain/enums/decision-verdict.enum';

export class RecordDecisionDto {
  @ApiProperty({ enum: DecisionVerdict, example: DecisionVerdict.APPROVE })
  @IsEnum(DecisionVerdict)
  verdict!: DecisionVerdict;

  @ApiPropertyOptional({
    description: 'Required when rejecting',
    example: 'Section 4 is incomplete',
  })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  reason?: string;

  @ApiPropertyOptional({
    description:
      'Delegator the caller is substituting for. Defaults to the first delegator whose decision is still open.',
    example: 'reviewer-1',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  onBehalfOf?: string;
}
