import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';

export class CreateApprovalDocumentDto {
  @ApiProperty({ example: 'Q3 vendor contract' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(500)
  title!: string;

  @ApiProperty({ example: 'Contract terms for review.' })
  @IsString()
  body!: string;

  @ApiPropertyOptional({
    description:
      'Hours a reviewer may stay silent before escalation. 0 escalates on the first check; null uses the service default.',
    example: 24,
    nullable: true,
  })
  @IsOptional()
  @ValidateIf((_, value) => value !== null)
  @IsNumber()
  @Min(0)
  escalationTimeoutHours?: number | null;

  @ApiPropertyOptional({
    description: 'Approvers added by successive escalations, in order',
    type: [String],
    example: ['lead-1', 'director-1'],
  })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  escalationLadder?: string[];
}
