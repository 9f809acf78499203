import {
  decision,
  delegation,
  reviewFixture,
} from '../../../../test/utils/approval-fixtures';
import { AUTHOR_ID, TEST_START } from '../../../../test/utils/approval-testing';
import { hoursAfter } from '../../../../test/utils/fixed-clock';
import { DecisionVerdict } from '../enums/decision-verdict.enum';
import {
  AlreadyDelegatedException,
  DecisionImmutableException,
  DelegationExpiredException,
  InvalidDelegationException,
  NotAReviewerException,
  NotAnAssignedReviewerException,
  RedelegationNotAllowedException,
  SelfApprovalException,
} from '../errors/approval-workflow.errors';
import { DecisionLedgerDomainService } from './decision-ledger.domain.service';
import { DelegationManagerDomainService } from './delegation-manager.domain.service';

const IN_ONE_HOUR = hoursAfter(TEST_START, 1);

describe('DelegationManagerDomainService', () => {
  let manager: DelegationManagerDomainService;

  beforeEach(() => {
    manager = new DelegationManagerDomainService(
      new DecisionLedgerDomainService(),
    );
  });

  describe('delegate', () => {
    it('should stage an active delegation for an assigned reviewer', () => {
      const { uow, cycle } = reviewFixture();

      const created = manager.delegate(
        uow,
        cycle,
        {
          delegatorId: 'reviewer-1',
          substituteId: 'reviewer-3',
          expiresAt: IN_ONE_HOUR,
        },
        TEST_START,
      );

      expect(created).toMatchObject({
        delegatorId: 'reviewer-1',
        substituteId: 'reviewer-3',
        expiresAt: IN_ONE_HOUR,
        revoked: false,
        revokedAt: null,
      });
      expect(uow.toChangeSet().createdDelegations).toEqual([created]);
    });

    it('should throw NotAnAssignedReviewer for an outsider', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'outsider-1',
            substituteId: 'reviewer-3',
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(NotAnAssignedReviewerException);
    });

    it('should throw AlreadyDelegated while a delegation is active', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-1',
            substituteId: 'reviewer-4',
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(AlreadyDelegatedException);
    });

    it('should allow a new delegation once the previous one expired', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      const created = manager.delegate(
        uow,
        cycle,
        {
          delegatorId: 'reviewer-1',
          substituteId: 'reviewer-4',
          expiresAt: hoursAfter(TEST_START, 5),
        },
        hoursAfter(TEST_START, 2),
      );

      expect(created.substituteId).toBe('reviewer-4');
    });

    it('should throw RedelegationNotAllowed for an assigned reviewer acting as a substitute', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-2', IN_ONE_HOUR)],
      });

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-2',
            substituteId: 'reviewer-3',
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(RedelegationNotAllowedException);
    });

    it('should reject delegating to oneself', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-1',
            substituteId: 'reviewer-1',
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(InvalidDelegationException);
    });

    it('should reject an expiry that is not in the future', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-1',
            substituteId: 'reviewer-3',
            expiresAt: TEST_START,
          },
          TEST_START,
        ),
      ).toThrow('Delegation expiry must be in the future');
    });

    it('should throw SelfApproval when the substitute is the author', () => {
      const { uow, cycle } = reviewFixture();

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-1',
            substituteId: AUTHOR_ID,
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(SelfApprovalException);
    });

    it('should throw DecisionImmutable when the delegator already decided', () => {
      const { uow, cycle } = reviewFixture({
        decisions: [decision('reviewer-1', DecisionVerdict.APPROVE)],
      });

      expect(() =>
        manager.delegate(
          uow,
          cycle,
          {
            delegatorId: 'reviewer-1',
            substituteId: 'reviewer-3',
            expiresAt: IN_ONE_HOUR,
          },
          TEST_START,
        ),
      ).toThrow(DecisionImmutableException);
    });
  });

  describe('revoke', () => {
    it('should mark the active delegation revoked', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      const revoked = manager.revoke(uow, cycle, 'reviewer-1', TEST_START);

      expect(revoked).toMatchObject({ revoked: true, revokedAt: TEST_START });
      expect(uow.toChangeSet().updatedDelegations).toHaveLength(1);
    });

    it('should return null when nothing is active', () => {
      const { uow, cycle } = reviewFixture();

      expect(manager.revoke(uow, cycle, 'reviewer-1', TEST_START)).toBeNull();
      expect(manager.revoke(uow, null, 'reviewer-1', TEST_START)).toBeNull();
      expect(uow.hasChanges()).toBe(false);
    });
  });

  describe('resolveActiveSubstitution', () => {
    it('should return the substitute only while the delegation is active', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      expect(
        manager.resolveActiveSubstitution(uow, cycle, 'reviewer-1', TEST_START),
      ).toBe('reviewer-3');
      expect(
        manager.resolveActiveSubstitution(uow, cycle, 'reviewer-1', IN_ONE_HOUR),
      ).toBeNull();
    });
  });

  describe('resolveEffectiveReviewer', () => {
    it('should return an assigned reviewer as themselves', () => {
      const { uow, cycle } = reviewFixture();

      expect(
        manager.resolveEffectiveReviewer(uow, cycle, 'reviewer-2', TEST_START),
      ).toBe('reviewer-2');
    });

    it('should resolve a substitute to the delegator', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      expect(
        manager.resolveEffectiveReviewer(uow, cycle, 'reviewer-3', TEST_START),
      ).toBe('reviewer-1');
    });

    it('should throw DelegationExpired once expiresAt has passed', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      expect(() =>
        manager.resolveEffectiveReviewer(uow, cycle, 'reviewer-3', IN_ONE_HOUR),
      ).toThrow(DelegationExpiredException);
    });

    it('should throw NotAReviewer for a revoked substitute', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [
          delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR, {
            revoked: true,
            revokedAt: TEST_START,
          }),
        ],
      });

      expect(() =>
        manager.resolveEffectiveReviewer(uow, cycle, 'reviewer-3', TEST_START),
      ).toThrow(NotAReviewerException);
    });

    it('should throw NotAReviewer when onBehalfOf names someone else', () => {
      const { uow, cycle } = reviewFixture({
        delegations: [delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR)],
      });

      expect(() =>
        manager.resolveEffectiveReviewer(
          uow,
          cycle,
          'reviewer-3',
          TEST_START,
          'reviewer-2',
        ),
      ).toThrow(NotAReviewerException);
    });
  });

  describe('describe', () => {
    it('should derive the state from revocation and expiry', () => {
      const active = delegation('reviewer-1', 'reviewer-3', IN_ONE_HOUR);
      const revoked = { ...active, revoked: true, revokedAt: TEST_START };

      expect(manager.describe(active, TEST_START)).toBe('active');
      expect(manager.describe(active, IN_ONE_HOUR)).toBe('expired');
      expect(manager.describe(revoked, TEST_START)).toBe('revoked');
    });
  });
});
