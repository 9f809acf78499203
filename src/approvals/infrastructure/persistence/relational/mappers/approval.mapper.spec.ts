import {
  assignment,
  CYCLE_ID,
  DOCUMENT_ID,
  reviewFixture,
} from '../../../../../../test/utils/approval-fixtures';
import { TEST_START } from '../../../../../../test/utils/approval-testing';
import { hoursAfter } from '../../../../../../test/utils/fixed-clock';
import { EscalationRecord } from '../../../../domain/entities/escalation-record.entity';
import { ReviewCycleEntity } from '../entities/review-cycle.entity';
import {
  ApprovalDocumentMapper,
  EscalationRecordMapper,
  ReviewCycleMapper,
  ReviewerAssignmentMapper,
} from './approval.mapper';

describe('Approval mappers', () => {
  describe('ApprovalDocumentMapper', () => {
    it('should keep a zero escalation timeout through persistence', () => {
      const { uow } = reviewFixture({
        document: { escalationTimeoutHours: 0, escalationLadder: ['manager-1'] },
      });

      const entity = ApprovalDocumentMapper.toPersistence(uow.document);
      const restored = ApprovalDocumentMapper.toDomain(entity);

      expect(entity.escalationTimeoutHours).toBe(0);
      expect(restored).toEqual(uow.document);
    });

    it('should keep a missing timeout as null', () => {
      const { uow } = reviewFixture();

      const restored = ApprovalDocumentMapper.toDomain(
        ApprovalDocumentMapper.toPersistence(uow.document),
      );

      expect(restored.escalationTimeoutHours).toBeNull();
      expect(restored.currentCycleId).toBe(CYCLE_ID);
    });

    it('should not share the ladder array with the domain object', () => {
      const { uow } = reviewFixture({
        document: { escalationLadder: ['manager-1'] },
      });

      const entity = ApprovalDocumentMapper.toPersistence(uow.document);
      entity.escalationLadder.push('manager-2');

      expect(uow.document.escalationLadder).toEqual(['manager-1']);
    });
  });

  describe('EscalationRecordMapper', () => {
    it('should restore the record including a zero timeout', () => {
      const record: EscalationRecord = {
        id: 'escalation-1',
        documentId: DOCUMENT_ID,
        cycleId: CYCLE_ID,
        depth: 1,
        escalatedToId: 'manager-1',
        escalatedFromIds: ['reviewer-1'],
        triggeredAt: TEST_START,
        timeoutHours: 0,
      };

      expect(
        EscalationRecordMapper.toDomain(
          EscalationRecordMapper.toPersistence(record),
        ),
      ).toEqual(record);
    });
  });

  describe('ReviewerAssignmentMapper.inAssignmentOrder', () => {
    function cycleEntity(id: string, reviewerIds: string[]): ReviewCycleEntity {
      const { cycle } = reviewFixture({ reviewerIds });
      return ReviewCycleMapper.toPersistence({ ...cycle, id });
    }

    it('should follow the cycle reviewer list for reviewers assigned together', () => {
      const rows = [
        assignment('reviewer-1'),
        assignment('reviewer-3'),
        assignment('reviewer-2'),
      ].map((row) => ReviewerAssignmentMapper.toPersistence(row));

      const ordered = ReviewerAssignmentMapper.inAssignmentOrder(
        [cycleEntity(CYCLE_ID, ['reviewer-3', 'reviewer-1', 'reviewer-2'])],
        rows,
      );

      expect(ordered.map((row) => row.reviewerId)).toEqual([
        'reviewer-3',
        'reviewer-1',
        'reviewer-2',
      ]);
    });

    it('should place escalated reviewers after the original ones by depth', () => {
      const rows = [
        assignment('manager-2', {
          assignedAt: hoursAfter(TEST_START, 48),
          escalated: true,
          escalationDepth: 2,
        }),
        assignment('manager-1', {
          assignedAt: hoursAfter(TEST_START, 24),
          escalated: true,
          escalationDepth: 1,
        }),
        assignment('reviewer-2'),
        assignment('reviewer-1'),
      ].map((row) => ReviewerAssignmentMapper.toPersistence(row));

      const ordered = ReviewerAssignmentMapper.inAssignmentOrder(
        [cycleEntity(CYCLE_ID, ['reviewer-1', 'reviewer-2'])],
        rows,
      );

      expect(ordered.map((row) => row.reviewerId)).toEqual([
        'reviewer-1',
        'reviewer-2',
        'manager-1',
        'manager-2',
      ]);
    });

    it('should leave the input array untouched', () => {
      const rows = [assignment('reviewer-2'), assignment('reviewer-1')].map(
        (row) => ReviewerAssignmentMapper.toPersistence(row),
      );

      ReviewerAssignmentMapper.inAssignmentOrder(
        [cycleEntity(CYCLE_ID, ['reviewer-1', 'reviewer-2'])],
        rows,
      );

      expect(rows.map((row) => row.reviewerId)).toEqual([
        'reviewer-2',
        'reviewer-1',
      ]);
    });
  });
});
