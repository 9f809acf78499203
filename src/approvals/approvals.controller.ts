import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiHeader,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { ApprovalsService } from './approvals.service';
import { ApprovalDocumentResponseDto } from './dto/approval-document-response.dto';
import { CreateApprovalDocumentDto } from './dto/create-approval-document.dto';
import { CreateDelegationDto } from './dto/create-delegation.dto';
import { DecideResponseDto } from './dto/decide-response.dto';
import { DelegationResponseDto } from './dto/delegation-response.dto';
import { EscalationCheckResponseDto } from './dto/escalation-check-response.dto';
import { ListNotificationsDto } from './dto/list-notifications.dto';
import { NotificationResponseDto } from './dto/notification-response.dto';
import { RecordDecisionDto } from './dto/record-decision.dto';
import { ReviewCycleHistoryDto } from './dto/review-cycle-history.dto';
import { SubmitDocumentDto } from './dto/submit-document.dto';
import { UpdateApprovalDocumentDto } from './dto/update-approval-document.dto';
import { ACTOR_ID_HEADER, ActorId } from './utils/actor-id.decorator';

const ID_PARAM = {
  name: 'id',
  description: 'Document ID (UUID)',
  example: '123e4567-e89b-12d3-a456-426614174000',
};

/**
 * Approval Documents Controller
 *
 * Translates requests into workflow calls. The caller's identity comes from
 * the x-actor-id header; authorization rules (author-only actions, reviewer
 * authority) are enforced by the workflow itself.
 */
@ApiTags('Approval Documents')
@ApiHeader({
  name: ACTOR_ID_HEADER,
  required: true,
  description: 'Authenticated user id of the caller',
})
@Controller({ path: 'approval-documents', version: '1' })
export class ApprovalsController {
  constructor(private readonly approvalsService: ApprovalsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a draft document' })
  @ApiCreatedResponse({ type: ApprovalDocumentResponseDto })
  @ApiBadRequestResponse({
    description: 'Invalid body, or the escalation ladder names the author',
  })
  create(
    @ActorId() actorId: string,
    @Body() dto: CreateApprovalDocumentDto,
  ): Promise<ApprovalDocumentResponseDto> {
    return this.approvalsService.create(dto, actorId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a document with its pending reviewers' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: ApprovalDocumentResponseDto })
  @ApiNotFoundResponse({ description: 'Document not found' })
  findOne(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ApprovalDocumentResponseDto> {
    return this.approvalsService.findOne(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Edit a draft (author only)' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: ApprovalDocumentResponseDto })
  @ApiForbiddenResponse({ description: 'Caller is not the author' })
  @ApiConflictResponse({
    description: 'Document is under review (UnderReview) or approved (DocumentLocked)',
  })
  update(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
    @Body() dto: UpdateApprovalDocumentDto,
  ): Promise<ApprovalDocumentResponseDto> {
    return this.approvalsService.update(id, dto, actorId);
  }

  @Post(':id/submit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Submit a draft for review (author only)' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: ApprovalDocumentResponseDto })
  @ApiBadRequestResponse({
    description: 'No reviewers (MissingReviewers) or the author is listed (SelfApproval)',
  })
  @ApiConflictResponse({ description: 'Document is not a draft' })
  submit(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
    @Body() dto: SubmitDocumentDto,
  ): Promise<ApprovalDocumentResponseDto> {
    return this.approvalsService.submit(id, dto.reviewerIds, actorId);
  }

  @Post(':id/resubmit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Open a new review cycle after a rejection (author only)',
  })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: ApprovalDocumentResponseDto })
  @ApiConflictResponse({ description: 'Document is not rejected' })
  resubmit(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
  ): Promise<ApprovalDocumentResponseDto> {
    return this.approvalsService.resubmit(id, actorId);
  }

  @Post(':id/decisions')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Approve or reject as an assigned reviewer or active substitute',
  })
  @ApiParam(ID_PARAM)
  @ApiCreatedResponse({ type: DecideResponseDto })
  @ApiBadRequestResponse({
    description: 'Reject without reason, or the author deciding',
  })
  @ApiForbiddenResponse({
    description: 'Caller is not a reviewer, or their delegation expired',
  })
  @ApiConflictResponse({
    description: 'Already decided, or document not under review',
  })
  decide(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
    @Body() dto: RecordDecisionDto,
  ): Promise<DecideResponseDto> {
    return this.approvalsService.decide(id, dto, actorId);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Every review cycle, oldest first' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: [ReviewCycleHistoryDto] })
  getHistory(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ReviewCycleHistoryDto[]> {
    return this.approvalsService.getHistory(id);
  }

  @Post(':id/delegations')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: "Delegate the caller's review to a substitute until expiresAt",
  })
  @ApiParam(ID_PARAM)
  @ApiCreatedResponse({ type: DelegationResponseDto })
  @ApiForbiddenResponse({
    description: 'Caller is not assigned, or is acting as a substitute',
  })
  @ApiConflictResponse({ description: 'An active delegation already exists' })
  delegate(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
    @Body() dto: CreateDelegationDto,
  ): Promise<DelegationResponseDto> {
    return this.approvalsService.delegate(id, dto, actorId);
  }

  @Delete(':id/delegations')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: "Revoke the caller's active delegation (no-op when none)",
  })
  @ApiParam(ID_PARAM)
  @ApiNoContentResponse({ description: 'Revoked, or nothing to revoke' })
  revoke(
    @Param('id', ParseUUIDPipe) id: string,
    @ActorId() actorId: string,
  ): Promise<void> {
    return this.approvalsService.revoke(id, actorId);
  }

  @Get(':id/delegations')
  @ApiOperation({ summary: 'All delegations with their current state' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: [DelegationResponseDto] })
  listDelegations(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<DelegationResponseDto[]> {
    return this.approvalsService.listDelegations(id);
  }

  @Post(':id/escalation-checks')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Evaluate reviewer timeouts now' })
  @ApiParam(ID_PARAM)
  @ApiOkResponse({ type: EscalationCheckResponseDto })
  @ApiConflictResponse({ description: 'Document is not under review' })
  checkEscalation(
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<EscalationCheckResponseDto> {
    return this.approvalsService.checkEscalation(id);
  }
}

@ApiTags('Notifications')
@ApiHeader({ name: ACTOR_ID_HEADER, required: true })
@Controller({ path: 'notifications', version: '1' })
export class NotificationsController {
  constructor(private readonly approvalsService: ApprovalsService) {}

  @Get()
  @ApiOperation({ summary: "The caller's workflow notifications, newest first" })
  @ApiOkResponse({ type: [NotificationResponseDto] })
  list(
    @ActorId() actorId: string,
    @Query() query: ListNotificationsDto,
  ): Promise<NotificationResponseDto[]> {
    return this.approvalsService.listNotifications(actorId, query.documentId);
  }
}
