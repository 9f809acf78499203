import { ApiProperty } from '@nestjs/swagger';
import { EscalationSkipReason } from '../domain/enums/escalation-skip-reason.enum';
import { EscalationRecordResponseDto } from './escalation-record-response.dto';

export class EscalationCheckResponseDto {
  @ApiProperty()
  escalated!: boolean;

  @ApiProperty({ type: EscalationRecordResponseDto, nullable: true })
  record!: EscalationRecordResponseDto | null;

  @ApiProperty({
    enum: EscalationSkipReason,
    nullable: true,
    description: 'Why nothing fired',
  })
  reason!: EscalationSkipReason | null;
}
