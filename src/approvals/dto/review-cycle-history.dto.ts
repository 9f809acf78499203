import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { CycleOutcome } from '../domain/enums/cycle-outcome.enum';
import { DecisionResponseDto } from './decision-response.dto';
import { DelegationResponseDto } from './delegation-response.dto';
import { EscalationRecordResponseDto } from './escalation-record-response.dto';

export class ReviewerAssignmentResponseDto {
  @ApiProperty({ example: 'reviewer-1' })
  @Expose()
  reviewerId!: string;

  @ApiProperty()
  @Expose()
  assignedAt!: Date;

  @ApiProperty({ description: 'Added by escalation' })
  @Expose()
  escalated!: boolean;

  @ApiProperty({ example: 0 })
  @Expose()
  escalationDepth!: number;
}

export class ReviewCycleHistoryDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: 1 })
  cycleNumber!: number;

  @ApiProperty({ type: [String] })
  reviewerIds!: string[];

  @ApiProperty({ enum: CycleOutcome })
  outcome!: CycleOutcome;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty({ nullable: true })
  closedAt!: Date | null;

  @ApiProperty({ type: [ReviewerAssignmentResponseDto] })
  assignments!: ReviewerAssignmentResponseDto[];

  @ApiProperty({ type: [DecisionResponseDto] })
  decisions!: DecisionResponseDto[];

  @ApiProperty({ type: [EscalationRecordResponseDto] })
  escalations!: EscalationRecordResponseDto[];

  @ApiProperty({ type: [DelegationResponseDto] })
  delegations!: DelegationResponseDto[];
}
