import {
  assignment,
  CYCLE_ID,
  decision,
  reviewFixture,
} from '../../../../test/utils/approval-fixtures';
import { TEST_START } from '../../../../test/utils/approval-testing';
import { CycleOutcome } from '../enums/cycle-outcome.enum';
import { DecisionVerdict } from '../enums/decision-verdict.enum';
import {
  DecisionImmutableException,
  DecisionRequiresReasonException,
  DuplicateDecisionException,
} from '../errors/approval-workflow.errors';
import {
  computeCycleOutcome,
  DecisionLedgerDomainService,
} from './decision-ledger.domain.service';

const { APPROVE, REJECT } = DecisionVerdict;

describe('computeCycleOutcome', () => {
  const assignments = [assignment('reviewer-1'), assignment('reviewer-2')];

  it('should stay pending until every reviewer approved', () => {
    expect(
      computeCycleOutcome(assignments, [decision('reviewer-1', APPROVE)]),
    ).toBe(CycleOutcome.PENDING);
  });

  it('should approve when every assigned reviewer approved', () => {
    expect(
      computeCycleOutcome(assignments, [
        decision('reviewer-2', APPROVE),
        decision('reviewer-1', APPROVE),
      ]),
    ).toBe(CycleOutcome.APPROVED);
  });

  it('should reject on any reject regardless of order', () => {
    const approve = decision('reviewer-1', APPROVE);
    const reject = decision('reviewer-2', REJECT);

    expect(computeCycleOutcome(assignments, [approve, reject])).toBe(
      CycleOutcome.REJECTED,
    );
    expect(computeCycleOutcome(assignments, [reject, approve])).toBe(
      CycleOutcome.REJECTED,
    );
  });

  it('should count escalated reviewers as required', () => {
    expect(
      computeCycleOutcome(
        [
          ...assignments,
          assignment('manager-1', { escalated: true, escalationDepth: 1 }),
        ],
        [decision('reviewer-1', APPROVE), decision('reviewer-2', APPROVE)],
      ),
    ).toBe(CycleOutcome.PENDING);
  });

  it('should stay pending with no assignments', () => {
    expect(computeCycleOutcome([], [])).toBe(CycleOutcome.PENDING);
  });
});

describe('DecisionLedgerDomainService', () => {
  let ledger: DecisionLedgerDomainService;

  beforeEach(() => {
    ledger = new DecisionLedgerDomainService();
  });

  describe('record', () => {
    it('should stage a decision with a trimmed reason', () => {
      const { uow, cycle } = reviewFixture();

      const recorded = ledger.record(
        uow,
        cycle,
        'reviewer-1',
        'reviewer-3',
        REJECT,
        '  Figures missing ',
        TEST_START,
      );

      expect(recorded).toMatchObject({
        cycleId: CYCLE_ID,
        reviewerId: 'reviewer-1',
        actingActorId: 'reviewer-3',
        verdict: REJECT,
        reason: 'Figures missing',
        decidedAt: TEST_START,
      });
      expect(uow.toChangeSet().createdDecisions).toEqual([recorded]);
    });

    it('should store an empty approve reason as null', () => {
      const { uow, cycle } = reviewFixture();

      const recorded = ledger.record(
        uow,
        cycle,
        'reviewer-1',
        'reviewer-1',
        APPROVE,
        '   ',
        TEST_START,
      );

      expect(recorded.reason).toBeNull();
    });

    it('should require a reason to reject', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        ledger.record(
          uow,
          cycle,
          'reviewer-1',
          'reviewer-1',
          REJECT,
          undefined,
          TEST_START,
        ),
      ).toThrow(DecisionRequiresReasonException);
      expect(uow.hasChanges()).toBe(false);
    });
  });

  describe('assertNotRecorded', () => {
    it('should pass when the reviewer has not decided', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        ledger.assertNotRecorded(uow, cycle, 'reviewer-1', APPROVE),
      ).not.toThrow();
    });

    it('should throw DuplicateDecision for the same verdict', () => {
      const { uow, cycle } = reviewFixture({
        decisions: [decision('reviewer-1', APPROVE)],
      });

      expect(() =>
        ledger.assertNotRecorded(uow, cycle, 'reviewer-1', APPROVE),
      ).toThrow(DuplicateDecisionException);
    });

    it('should throw DecisionImmutable for a different verdict', () => {
      const { uow, cycle } = reviewFixture({
        decisions: [decision('reviewer-1', REJECT)],
      });

      expect(() =>
        ledger.assertNotRecorded(uow, cycle, 'reviewer-1', APPROVE),
      ).toThrow(DecisionImmutableException);
    });

    it('should throw DecisionImmutable when no verdict is given', () => {
      const { uow, cycle } = reviewFixture({
        decisions: [decision('reviewer-1', APPROVE)],
      });

      expect(() => ledger.assertNotRecorded(uow, cycle, 'reviewer-1')).toThrow(
        DecisionImmutableException,
      );
    });
  });

  describe('pendingReviewers', () => {
    it('should list undecided reviewers in assignment order', () => {
      const { uow, cycle } = reviewFixture({
        reviewerIds: ['reviewer-3', 'reviewer-1', 'reviewer-2'],
        decisions: [decision('reviewer-1', APPROVE)],
      });

      expect(ledger.pendingReviewers(uow, cycle)).toEqual([
        'reviewer-3',
        'reviewer-2',
      ]);
    });
  });
});
