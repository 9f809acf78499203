import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { DocumentStatus } from '../../../../domain/enums/document-status.enum';

@Entity({
  name: 'approval_documents',
})
export class ApprovalDocumentEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'author_id', type: 'varchar', length: 255 })
  @Index()
  authorId!: string;

  @Column({ type: 'varchar', length: 500 })
  title!: string;

  @Column({ type: 'text' })
  body!: string;

  @Column({
    type: 'enum',
    enum: DocumentStatus,
    default: DocumentStatus.DRAFT,
  })
  @Index()
  status!: DocumentStatus;

  @Column({ name: 'current_cycle_id', type: 'uuid', nullable: true })
  currentCycleId!: string | null;

  @Column({
    name: 'escalation_timeout_hours',
    type: 'double precision',
    nullable: true,
  })
  escalationTimeoutHours!: number | null;

  @Column({ name: 'escalation_ladder', type: 'jsonb', default: () => "'[]'" })
  escalationLadder!: string[];

  @Column({ name: 'escalation_depth', type: 'integer', default: 0 })
  escalationDepth!: number;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
