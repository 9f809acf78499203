import { ApiProperty } from '@nestjs/swagger';
import { CycleOutcome } from '../domain/enums/cycle-outcome.enum';
import { ApprovalDocumentResponseDto } from './approval-document-response.dto';
import { DecisionResponseDto } from './decision-response.dto';

export class DecideResponseDto {
  @ApiProperty({ type: ApprovalDocumentResponseDto })
  document!: ApprovalDocumentResponseDto;

  @ApiProperty({ type: DecisionResponseDto })
  decision!: DecisionResponseDto;

  @ApiProperty({ enum: CycleOutcome, example: CycleOutcome.PENDING })
  outcome!: CycleOutcome;
}
