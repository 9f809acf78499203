import { Column, Entity, Index, PrimaryColumn } from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { NotificationType } from '../../../../domain/enums/notification-type.enum';

@Entity({
  name: 'notification_events',
})
@Index(['recipientId', 'createdAt'])
export class NotificationEventEntity extends EntityRelationalHelper {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ name: 'document_id', type: 'uuid' })
  @Index()
  documentId!: string;

  @Column({ name: 'recipient_id', type: 'varchar', length: 255 })
  recipientId!: string;

  @Column({ type: 'varchar', length: 50 })
  type!: NotificationType;

  @Column({ name: 'cycle_id', type: 'uuid', nullable: true })
  cycleId!: string | null;

  @Column({ type: 'text' })
  message!: string;

  @Column({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
