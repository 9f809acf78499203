import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DocumentStatus } from '../domain/enums/document-status.enum';

export class ApprovalDocumentResponseDto {
  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  @Expose()
  id!: string;

  @ApiProperty({ example: 'author-1' })
  @Expose()
  authorId!: string;

  @ApiProperty({ example: 'Q3 vendor contract' })
  @Expose()
  title!: string;

  @ApiProperty({ example: 'Contract terms for review.' })
  @Expose()
  body!: string;

  @ApiProperty({ enum: DocumentStatus, example: DocumentStatus.REVIEW })
  @Expose()
  status!: DocumentStatus;

  @ApiProperty({ nullable: true, example: null })
  @Expose()
  currentCycleId!: string | null;

  @ApiProperty({ nullable: true, example: 24 })
  @Expose()
  escalationTimeoutHours!: number | null;

  @ApiProperty({ type: [String], example: ['lead-1'] })
  @Expose()
  escalationLadder!: string[];

  @ApiProperty({ example: 0 })
  @Expose()
  escalationDepth!: number;

  @ApiProperty({
    description: 'Reviewers of the current cycle who have not decided yet',
    type: [String],
    example: ['reviewer-2'],
  })
  @Expose()
  pendingReviewerIds!: string[];

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty()
  @Expose()
  updatedAt!: Date;
}
