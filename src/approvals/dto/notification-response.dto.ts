import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { NotificationType } from '../domain/enums/notification-type.enum';

export class NotificationResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty()
  @Expose()
  documentId!: string;

  @ApiProperty({ example: 'reviewer-1' })
  @Expose()
  recipientId!: string;

  @ApiProperty({ enum: NotificationType })
  @Expose()
  type!: NotificationType;

  @ApiProperty({ nullable: true })
  @Expose()
  cycleId!: string | null;

  @ApiProperty()
  @Expose()
  message!: string;

  @ApiProperty()
  @Expose()
  createdAt!: Date;
}
