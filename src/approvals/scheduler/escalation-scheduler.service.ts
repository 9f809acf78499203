import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AllConfigType } from '../../config/config.type';
import { DocumentStatus } from '../domain/enums/document-status.enum';
import { ApprovalDocumentRepositoryPort } from '../domain/repositories/approval-document.repository.port';
import { ApprovalWorkflowDomainService } from '../domain/services/approval-workflow.domain.service';

export interface EscalationScanSummary {
  scanned: number;
  escalated: number;
  failed: number;
}

/**
 * Background job that runs the escalation check for every document under
 * review.
 *
 * Each document is checked on its own; a failure is logged and the sweep
 * moves on to the next document.
 */
@Injectable()
export class EscalationSchedulerService {
  private readonly logger = new Logger(EscalationSchedulerService.name);
  private running = false;

  constructor(
    private readonly repository: ApprovalDocumentRepositoryPort,
    private readonly workflow: ApprovalWorkflowDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  @Cron(CronExpression.EVERY_5_MINUTES, {
    name: 'approval-escalation-scan',
    timeZone: 'UTC',
  })
  async handleEscalationScan(): Promise<void> {
    if (
      !this.configService.get('approvals.escalationScanEnabled', {
        infer: true,
      })
    ) {
      return;
    }
    // Skip a tick while the previous sweep is still going
    if (this.running) {
      this.logger.warn('Previous escalation scan still running; skipping');
      return;
    }

    this.running = true;
    try {
      await this.runScan();
    } catch (error) {
      this.logger.error(
        'Escalation scan failed',
        error instanceof Error ? error.stack : String(error),
      );
    } finally {
      this.running = false;
    }
  }

  async runScan(now?: Date): Promise<EscalationScanSummary> {
    const startTime = Date.now();
    const documentIds = await this.repository.findIdsByStatus(
      DocumentStatus.REVIEW,
    );
    const summary: EscalationScanSummary = {
      scanned: documentIds.length,
      escalated: 0,
      failed: 0,
    };

    for (const documentId of documentIds) {
      try {
        const result = await this.workflow.checkEscalation(documentId, now);
        if (result.escalated) {
          summary.escalated++;
        }
      } catch (error) {
        summary.failed++;
        this.logger.error(
          `Escalation check failed for document ${documentId}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }

    this.logger.log(
      `Escalation scan completed in ${Date.now() - startTime}ms: ${summary.scanned} scanned, ${summary.escalated} escalated, ${summary.failed} failed`,
    );
    return summary;
  }
}
