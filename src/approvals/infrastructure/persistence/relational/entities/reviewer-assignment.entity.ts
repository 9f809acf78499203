import { Column, Entity, Index, PrimaryColumn, Unique } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'reviewer_assignments',
})
@Unique(['cycleId', 'reviewerId'])
export class ReviewerAssignmentEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'cycle_id', type: 'uuid' })
  @Index()
  cycleId!: string;

  @Column({ name: 'reviewer_id', type: 'varchar', length: 255 })
  reviewerId!: string;

  @Column({ name: 'assigned_at', type: 'timestamptz' })
  assignedAt!: Date;

  @Column({ type: 'boolean', default: false })
  escalated!: boolean;

  @Column({ name: 'escalation_depth', type: 'integer', default: 0 })
  escalationDepth!: number;
}
