import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';

export class DelegationResponseDto {
  @ApiProperty()
  @Expose()
  id!: string;

  @ApiProperty()
  @Expose()
  documentId!: string;

  @ApiProperty()
  @Expose()
  cycleId!: string;

  @ApiProperty({ example: 'reviewer-1' })
  @Expose()
  delegatorId!: string;

  @ApiProperty({ example: 'reviewer-3' })
  @Expose()
  substituteId!: string;

  @ApiProperty()
  @Expose()
  expiresAt!: Date;

  @ApiProperty()
  @Expose()
  revoked!: boolean;

  @ApiProperty({ nullable: true, example: null })
  @Expose()
  revokedAt!: Date | null;

  @ApiProperty()
  @Expose()
  createdAt!: Date;

  @ApiProperty({
    description: 'Derived at read time; expiry is never stored',
    enum: ['active', 'expired', 'revoked'],
    example: 'active',
  })
  @Expose()
  state!: 'active' | 'expired' | 'revoked';
}
