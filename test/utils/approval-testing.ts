import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { ApprovalsConfig } from '../../src/approvals/config/approvals-config.type';
import { ClockPort } from '../../src/approvals/domain/ports/clock.port';
import { ApprovalDocumentRepositoryPort } from '../../src/approvals/domain/repositories/approval-document.repository.port';
import {
  ApprovalWorkflowDomainService,
  DocumentContent,
} from '../../src/approvals/domain/services/approval-workflow.domain.service';
import { DecisionLedgerDomainService } from '../../src/approvals/domain/services/decision-ledger.domain.service';
import { DelegationManagerDomainService } from '../../src/approvals/domain/services/delegation-manager.domain.service';
import { DocumentLockService } from '../../src/approvals/domain/services/document-lock.service';
import { EscalationTrackerDomainService } from '../../src/approvals/domain/services/escalation-tracker.domain.service';
import { InMemoryApprovalDocumentRepository } from '../../src/approvals/infrastructure/persistence/in-memory/in-memory-approval-document.repository';
import {
  AuditService,
  WorkflowEventData,
} from '../../src/audit/audit.service';
import { AppConfig } from '../../src/config/app-config.type';
import { AllConfigType } from '../../src/config/config.type';
import { FixedClock } from './fixed-clock';

export const TEST_START = new Date('2025-03-03T09:00:00.000Z');
export const AUTHOR_ID = 'author-1';

export const DEFAULT_TEST_APPROVALS_CONFIG: ApprovalsConfig = {
  defaultEscalationTimeoutHours: 24,
  maxEscalationDepth: 3,
  escalationScanEnabled: true,
};

const TEST_APP_CONFIG: AppConfig = {
  nodeEnv: 'test',
  name: 'document-approval-api',
  port: 3000,
  apiPrefix: 'api',
};

export interface ApprovalTestContext extends ApprovalTestDoubles {
  module: TestingModule;
  workflow: ApprovalWorkflowDomainService;
}

export interface AuditMock {
  logWorkflowEvent: jest.Mock<void, [WorkflowEventData]>;
  logWorkflowEvents: jest.Mock<void, [WorkflowEventData[]]>;
}

export function createTestConfigService(
  approvals: Partial<ApprovalsConfig> = {},
): ConfigService<AllConfigType> {
  return new ConfigService<AllConfigType>({
    app: TEST_APP_CONFIG,
    approvals: { ...DEFAULT_TEST_APPROVALS_CONFIG, ...approvals },
  });
}

export interface ApprovalTestDoubles {
  repository: InMemoryApprovalDocumentRepository;
  clock: FixedClock;
  audit: AuditMock;
}

export function createTestDoubles(start: Date = TEST_START): ApprovalTestDoubles {
  return {
    repository: new InMemoryApprovalDocumentRepository(),
    clock: new FixedClock(start),
    audit: {
      logWorkflowEvent: jest.fn<void, [WorkflowEventData]>(),
      logWorkflowEvents: jest.fn<void, [WorkflowEventData[]]>(),
    },
  };
}

/**
 * Real domain services wired to in-process doubles for storage, time, audit
 * and configuration
 */
export function approvalTestProviders(
  doubles: ApprovalTestDoubles,
  approvals: Partial<ApprovalsConfig> = {},
): Provider[] {
  return [
    ApprovalWorkflowDomainService,
    DecisionLedgerDomainService,
    DelegationManagerDomainService,
    EscalationTrackerDomainService,
    DocumentLockService,
    { provide: ApprovalDocumentRepositoryPort, useValue: doubles.repository },
    { provide: ClockPort, useValue: doubles.clock },
    { provide: AuditService, useValue: doubles.audit },
    { provide: ConfigService, useValue: createTestConfigService(approvals) },
  ];
}

export async function createApprovalTestContext(
  options: { approvals?: Partial<ApprovalsConfig>; start?: Date } = {},
): Promise<ApprovalTestContext> {
  const doubles = createTestDoubles(options.start);
  const module = await Test.createTestingModule({
    providers: approvalTestProviders(doubles, options.approvals),
  }).compile();

  return {
    module,
    workflow: module.get(ApprovalWorkflowDomainService),
    ...doubles,
  };
}

/**
 * Every batched audit event type written so far, in order
 */
export function auditedEvents(audit: AuditMock): string[] {
  return audit.logWorkflowEvents.mock.calls.flatMap(([events]) =>
    events.map((entry) => entry.event),
  );
}

export async function createDraft(
  context: ApprovalTestContext,
  content: Partial<DocumentContent> = {},
): Promise<string> {
  const document = await context.workflow.create(AUTHOR_ID, {
    title: 'Quarterly budget',
    body: 'Spend plan for Q2',
    ...content,
  });
  return document.id;
}

export async function createInReview(
  context: ApprovalTestContext,
  reviewerIds: string[],
  content: Partial<DocumentContent> = {},
): Promise<string> {
  const documentId = await createDraft(context, content);
  await context.workflow.submit(documentId, reviewerIds, AUTHOR_ID);
  return documentId;
}
