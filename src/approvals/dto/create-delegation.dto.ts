import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsDate, IsNotEmpty, IsString } from 'class-validator';

// Date and time with an explicit UTC designator or offset
const ISO_INSTANT =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;

export class CreateDelegationDto {
  @ApiProperty({ example: 'reviewer-3' })
  @IsString()
  @IsNotEmpty()
  substituteId!: string;

  @ApiProperty({
    description:
      'UTC instant after which the substitute loses authority; the offset is required',
    example: '2025-01-20T18:00:00Z',
  })
  @Transform(({ value }) =>
    typeof value === 'string' && ISO_INSTANT.test(value)
      ? new Date(value)
      : value,
  )
  @IsDate({
    message: 'expiresAt must be an ISO 8601 timestamp with a UTC offset',
  })
  expiresAt!: Date;
}
