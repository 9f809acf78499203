import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export enum WorkflowEventType {
  DOCUMENT_CREATED = 'DOCUMENT_CREATED',
  DOCUMENT_EDITED = 'DOCUMENT_EDITED',
  DOCUMENT_SUBMITTED = 'DOCUMENT_SUBMITTED',
  DOCUMENT_RESUBMITTED = 'DOCUMENT_RESUBMITTED',
  DECISION_RECORDED = 'DECISION_RECORDED',
  DOCUMENT_APPROVED = 'DOCUMENT_APPROVED',
  DOCUMENT_REJECTED = 'DOCUMENT_REJECTED',
  DELEGATION_GRANTED = 'DELEGATION_GRANTED',
  DELEGATION_REVOKED = 'DELEGATION_REVOKED',
  DOCUMENT_ESCALATED = 'DOCUMENT_ESCALATED',
  // Not an error: the escalation that would have fired was skipped
  MAX_ESCALATION_DEPTH_REACHED = 'MAX_ESCALATION_DEPTH_REACHED',
}

export type AuditMetadataValue = string | number | boolean | null | string[];

export interface WorkflowEventData {
  actorId: string;
  event: WorkflowEventType;
  documentId: string;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, AuditMetadataValue>;
}

/**
 * Audit Service for workflow events
 *
 * One structured JSON line per event, written to stdout where the log
 * collector picks it up. Entries carry identifiers only: document titles,
 * bodies and decision reasons are never logged.
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logWorkflowEvent(data: WorkflowEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'approvals',
      actorId: data.actorId,
      event: data.event,
      documentId: data.documentId,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  logWorkflowEvents(events: WorkflowEventData[]): void {
    events.forEach((event) => this.logWorkflowEvent(event));
  }

  /**
   * Error messages can quote user-supplied text; keep them short and strip
   * anything that looks like an address or credential.
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .substring(0, 500);
  }
}
