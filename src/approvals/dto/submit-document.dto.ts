import { ApiProperty } from '@nestjs/swagger';
import { ArrayMaxSize, IsArray, IsNotEmpty, IsString } from 'class-validator';

export class SubmitDocumentDto {
  @ApiProperty({
    description:
      'Reviewers for the first cycle. Duplicates are ignored; an empty list is rejected with MissingReviewers.',
    type: [String],
    example: ['reviewer-1', 'reviewer-2'],
  })
  @IsArray()
  @ArrayMaxSize(50)
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  reviewerIds!: string[];
}
