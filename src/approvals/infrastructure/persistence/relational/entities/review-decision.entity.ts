import { Column, Entity, Index, PrimaryColumn, Unique } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DecisionVerdict } from '../../../../domain/enums/decision-verdict.enum';

/**
 * Write-once. The repository only ever inserts into review_decisions.
 */
@Entity({
  name: 'review_decisions',
})
@Unique(['cycleId', 'reviewerId'])
export class ReviewDecisionEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'cycle_id', type: 'uuid' })
  @Index()
  cycleId!: string;

  @Column({ name: 'reviewer_id', type: 'varchar', length: 255 })
  reviewerId!: string;

  @Column({ name: 'acting_actor_id', type: 'varchar', length: 255 })
  actingActorId!: string;

  @Column({ type: 'enum', enum: DecisionVerdict })
  verdict!: DecisionVerdict;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @Column({ name: 'decided_at', type: 'timestamptz' })
  decidedAt!: Date;
}
