import { PartialType } from '@nestjs/swagger';
import { CreateApprovalDocumentDto } from './create-approval-document.dto';

export class UpdateApprovalDocumentDto extends PartialType(
  CreateApprovalDocumentDto,
) {}
