import { Column, Entity, Index, PrimaryColumn, Unique } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'escalation_records',
})
@Unique(['cycleId', 'depth'])
export class EscalationRecordEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'document_id', type: 'uuid' })
  @Index()
  documentId!: string;

  @Column({ name: 'cycle_id', type: 'uuid' })
  cycleId!: string;

  @Column({ type: 'integer' })
  depth!: number;

  @Column({ name: 'escalated_to_id', type: 'varchar', length: 255 })
  escalatedToId!: string;

  @Column({ name: 'escalated_from_ids', type: 'jsonb' })
  escalatedFromIds!: string[];

  @Column({ name: 'triggered_at', type: 'timestamptz' })
  triggeredAt!: Date;

  @Column({ name: 'timeout_hours', type: 'double precision' })
  timeoutHours!: number;
}
