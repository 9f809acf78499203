import { Column, Entity, Index, PrimaryColumn, Unique } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { CycleOutcome } from '../../../../domain/enums/cycle-outcome.enum';

@Entity({
  name: 'review_cycles',
})
@Unique(['documentId', 'cycleNumber'])
export class ReviewCycleEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'document_id', type: 'uuid' })
  @Index()
  documentId!: string;

  @Column({ name: 'cycle_number', type: 'integer' })
  cycleNumber!: number;

  @Column({ name: 'reviewer_ids', type: 'jsonb' })
  reviewerIds!: string[];

  @Column({ type: 'enum', enum: CycleOutcome, default: CycleOutcome.PENDING })
  outcome!: CycleOutcome;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'closed_at', type: 'timestamptz', nullable: true })
  closedAt!: Date | null;
}
