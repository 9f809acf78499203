import {
  ClassSerializerInterceptor,
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import {
  ApprovalsController,
  NotificationsController,
} from '../../src/approvals/approvals.controller';
import { ApprovalsService } from '../../src/approvals/approvals.service';
import validationOptions from '../../src/utils/validation-options';
import {
  approvalTestProviders,
  AUTHOR_ID,
  createTestDoubles,
  TEST_START,
} from '../utils/approval-testing';
import { hoursAfter } from '../utils/fixed-clock';

const DOCUMENTS_URL = '/api/v1/approval-documents';

describe('Approval Documents (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const doubles = createTestDoubles();
    const moduleRef = await Test.createTestingModule({
      controllers: [ApprovalsController, NotificationsController],
      providers: [ApprovalsService, ...approvalTestProviders(doubles)],
    }).compile();

    app = moduleRef.createNestApplication();
    app.setGlobalPrefix('api');
    app.enableVersioning({ type: VersioningType.URI });
    app.useGlobalPipes(new ValidationPipe(validationOptions));
    app.useGlobalInterceptors(
      new ClassSerializerInterceptor(app.get(Reflector)),
    );
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  async function createDocument(
    body: Record<string, unknown> = {},
  ): Promise<string> {
    const response = await request(app.getHttpServer())
      .post(DOCUMENTS_URL)
      .set('x-actor-id', AUTHOR_ID)
      .send({ title: 'Vendor contract', body: 'Terms v1', ...body })
      .expect(201);
    return response.body.id;
  }

  async function submit(documentId: string, reviewerIds: string[]) {
    return request(app.getHttpServer())
      .post(`${DOCUMENTS_URL}/${documentId}/submit`)
      .set('x-actor-id', AUTHOR_ID)
      .send({ reviewerIds })
      .expect(200);
  }

  function decide(
    documentId: string,
    actorId: string,
    body: Record<string, unknown>,
  ) {
    return request(app.getHttpServer())
      .post(`${DOCUMENTS_URL}/${documentId}/decisions`)
      .set('x-actor-id', actorId)
      .send(body);
  }

  describe('POST /api/v1/approval-documents', () => {
    it('should create a draft', async () => {
      const response = await request(app.getHttpServer())
        .post(DOCUMENTS_URL)
        .set('x-actor-id', AUTHOR_ID)
        .send({
          title: 'Vendor contract',
          body: 'Terms v1',
          escalationLadder: ['manager-1'],
        })
        .expect(201);

      expect(response.body).toMatchObject({
        authorId: AUTHOR_ID,
        title: 'Vendor contract',
        status: 'draft',
        currentCycleId: null,
        escalationTimeoutHours: null,
        escalationLadder: ['manager-1'],
        escalationDepth: 0,
        pendingReviewerIds: [],
        createdAt: TEST_START.toISOString(),
      });
    });

    it('should require the actor header', async () => {
      const response = await request(app.getHttpServer())
        .post(DOCUMENTS_URL)
        .send({ title: 'Vendor contract', body: 'Terms v1' })
        .expect(400);

      expect(response.body.message).toBe('Missing x-actor-id header');
    });

    it('should validate the body', async () => {
      const response = await request(app.getHttpServer())
        .post(DOCUMENTS_URL)
        .set('x-actor-id', AUTHOR_ID)
        .send({ body: 'Terms v1', escalationTimeoutHours: -3 })
        .expect(400);

      expect(response.body.errors).toHaveProperty('title');
      expect(response.body.errors).toHaveProperty('escalationTimeoutHours');
    });

    it('should reject a ladder naming the author', async () => {
      const response = await request(app.getHttpServer())
        .post(DOCUMENTS_URL)
        .set('x-actor-id', AUTHOR_ID)
        .send({
          title: 'Vendor contract',
          body: 'Terms v1',
          escalationLadder: [AUTHOR_ID],
        })
        .expect(400);

      expect(response.body.code).toBe('InvalidEscalationLadder');
    });
  });

  describe('review flow', () => {
    it('should approve after both reviewers approve and then lock edits', async () => {
      const documentId = await createDocument();

      const submitted = await submit(documentId, ['reviewer-1', 'reviewer-2']);
      expect(submitted.body).toMatchObject({
        status: 'review',
        pendingReviewerIds: ['reviewer-1', 'reviewer-2'],
      });

      const first = await decide(documentId, 'reviewer-1', {
        verdict: 'approve',
      }).expect(201);
      expect(first.body.outcome).toBe('pending');
      expect(first.body.document.pendingReviewerIds).toEqual(['reviewer-2']);

      const second = await decide(documentId, 'reviewer-2', {
        verdict: 'approve',
      }).expect(201);
      expect(second.body.outcome).toBe('approved');
      expect(second.body.document.status).toBe('approved');

      const edit = await request(app.getHttpServer())
        .patch(`${DOCUMENTS_URL}/${documentId}`)
        .set('x-actor-id', AUTHOR_ID)
        .send({ body: 'Terms v2' })
        .expect(409);
      expect(edit.body).toMatchObject({
        statusCode: 409,
        code: 'DocumentLocked',
        documentId,
      });
    });

    it('should require a reason to reject', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1']);

      const response = await decide(documentId, 'reviewer-1', {
        verdict: 'reject',
      }).expect(400);

      expect(response.body.code).toBe('DecisionRequiresReason');
    });

    it('should report a changed verdict as immutable', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1', 'reviewer-2']);
      await decide(documentId, 'reviewer-1', {
        verdict: 'reject',
        reason: 'Terms unclear',
      }).expect(201);

      const response = await decide(documentId, 'reviewer-1', {
        verdict: 'approve',
      }).expect(409);

      expect(response.body).toMatchObject({
        code: 'DecisionImmutable',
        reviewerId: 'reviewer-1',
        existingVerdict: 'reject',
        verdict: 'approve',
      });
    });

    it('should resubmit into a second cycle', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1']);
      await decide(documentId, 'reviewer-1', {
        verdict: 'reject',
        reason: 'Terms unclear',
      }).expect(201);

      await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/resubmit`)
        .set('x-actor-id', AUTHOR_ID)
        .expect(200);
      const history = await request(app.getHttpServer())
        .get(`${DOCUMENTS_URL}/${documentId}/history`)
        .expect(200);

      expect(
        history.body.map((cycle: { cycleNumber: number; outcome: string }) => [
          cycle.cycleNumber,
          cycle.outcome,
        ]),
      ).toEqual([
        [1, 'rejected'],
        [2, 'pending'],
      ]);
      expect(history.body[0].decisions[0].reason).toBe('Terms unclear');
    });

    it('should return 403 when someone else submits', async () => {
      const documentId = await createDocument();

      const response = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/submit`)
        .set('x-actor-id', 'reviewer-1')
        .send({ reviewerIds: ['reviewer-2'] })
        .expect(403);

      expect(response.body.code).toBe('NotDocumentAuthor');
    });
  });

  describe('delegations', () => {
    it('should let a substitute decide for the delegator until revoked', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1', 'reviewer-2']);

      const granted = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .set('x-actor-id', 'reviewer-1')
        .send({
          substituteId: 'reviewer-3',
          expiresAt: hoursAfter(TEST_START, 1).toISOString(),
        })
        .expect(201);
      expect(granted.body).toMatchObject({
        delegatorId: 'reviewer-1',
        substituteId: 'reviewer-3',
        expiresAt: '2025-03-03T10:00:00.000Z',
        revoked: false,
        state: 'active',
      });

      const decided = await decide(documentId, 'reviewer-3', {
        verdict: 'approve',
      }).expect(201);
      expect(decided.body.decision).toMatchObject({
        reviewerId: 'reviewer-1',
        actingActorId: 'reviewer-3',
      });

      await request(app.getHttpServer())
        .delete(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .set('x-actor-id', 'reviewer-2')
        .expect(204);
      const listed = await request(app.getHttpServer())
        .get(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .expect(200);
      expect(listed.body).toHaveLength(1);
      expect(listed.body[0].state).toBe('active');
    });

    it('should reject an expiry that is not a date', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1']);

      const response = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .set('x-actor-id', 'reviewer-1')
        .send({ substituteId: 'reviewer-3', expiresAt: 'tomorrow' })
        .expect(400);

      expect(response.body.errors).toHaveProperty('expiresAt');
    });

    it('should reject an expiry without a UTC offset', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1']);

      const response = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .set('x-actor-id', 'reviewer-1')
        .send({ substituteId: 'reviewer-3', expiresAt: '2025-03-03T10:00:00' })
        .expect(400);

      expect(response.body.errors).toHaveProperty('expiresAt');
    });

    it('should accept an expiry with a numeric offset', async () => {
      const documentId = await createDocument();
      await submit(documentId, ['reviewer-1']);

      const response = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/delegations`)
        .set('x-actor-id', 'reviewer-1')
        .send({
          substituteId: 'reviewer-3',
          expiresAt: '2025-03-03T12:00:00+02:00',
        })
        .expect(201);

      expect(response.body.expiresAt).toBe('2025-03-03T10:00:00.000Z');
    });
  });

  describe('escalation', () => {
    it('should escalate on demand and notify the new approver', async () => {
      const documentId = await createDocument({
        escalationTimeoutHours: 0,
        escalationLadder: ['manager-1'],
      });
      await submit(documentId, ['reviewer-1']);

      const check = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/escalation-checks`)
        .set('x-actor-id', AUTHOR_ID)
        .expect(200);
      expect(check.body).toMatchObject({
        escalated: true,
        reason: null,
        record: {
          depth: 1,
          escalatedToId: 'manager-1',
          escalatedFromIds: ['reviewer-1'],
          timeoutHours: 0,
        },
      });

      const notifications = await request(app.getHttpServer())
        .get('/api/v1/notifications')
        .set('x-actor-id', 'manager-1')
        .query({ documentId })
        .expect(200);
      expect(notifications.body).toHaveLength(1);
      expect(notifications.body[0]).toMatchObject({
        type: 'document_escalated',
        message: `Document ${documentId} was escalated to you after 0h without a decision`,
      });
    });

    it('should return 409 for a draft', async () => {
      const documentId = await createDocument();

      const response = await request(app.getHttpServer())
        .post(`${DOCUMENTS_URL}/${documentId}/escalation-checks`)
        .set('x-actor-id', AUTHOR_ID)
        .expect(409);

      expect(response.body.code).toBe('InvalidTransition');
    });
  });

  describe('GET /api/v1/approval-documents/:id', () => {
    it('should return 404 for an unknown document', async () => {
      const response = await request(app.getHttpServer())
        .get(`${DOCUMENTS_URL}/123e4567-e89b-42d3-a456-426614174000`)
        .expect(404);

      expect(response.body.code).toBe('DocumentNotFound');
    });

    it('should return 400 for a malformed id', async () => {
      await request(app.getHttpServer())
        .get(`${DOCUMENTS_URL}/not-a-uuid`)
        .expect(400);
    });
  });
});
