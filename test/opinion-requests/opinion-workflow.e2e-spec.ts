import {
  ClassSerializerInterceptor,
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { JwtService } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AuditService } from '../../src/audit/audit.service';
import { Actor } from '../../src/auth/domain/actor';
import { JwtStrategy } from '../../src/auth/strategies/jwt.strategy';
import { OpinionRequestsController } from '../../src/opinion-requests/opinion-requests.controller';
import { OpinionRequestsService } from '../../src/opinion-requests/opinion-requests.service';
import { OpinionStatisticsController } from '../../src/opinion-requests/opinion-statistics.controller';
import { OpinionsController } from '../../src/opinion-requests/opinions.controller';
import validationOptions from '../../src/utils/validation-options';
import {
  EXPERT_ID,
  FINANCE_DEPARTMENT_ID,
  FINANCE_EXPERT_ID,
  HOME_DEPARTMENT_ID,
  WorkflowFixtures,
  actors,
  createWorkflowFixtures,
  filesConfig,
  workflowProviders,
} from '../utils/workflow-test-harness';

const JWT_SECRET = 'test-secret';
const BASE = '/api/v1';

/**
 * Opinion workflow over HTTP
 *
 * The real controllers, application service, domain services and JWT
 * strategy run in process; persistence, file storage, the department
 * registry and the user directory are in-memory stand-ins.
 */
describe('Opinion Workflow (E2E)', () => {
  let app: INestApplication;
  let fixtures: WorkflowFixtures;
  let infoSpy: jest.SpyInstance;
  const jwt = new JwtService({ secret: JWT_SECRET });

  function tokenFor(actor: Actor): string {
    return jwt.sign({
      id: actor.id,
      role: { id: actor.role },
      departmentId: actor.departmentId,
      isActive: actor.isActive,
      permissions: actor.permissions,
    });
  }

  beforeEach(async () => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    fixtures = createWorkflowFixtures();

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [
            () => ({
              app: { name: 'Opinion Workflow API', nodeEnv: 'test' },
              auth: { secret: JWT_SECRET },
              files: filesConfig,
            }),
          ],
        }),
        PassportModule,
      ],
      controllers: [
        OpinionRequestsController,
        OpinionsController,
        OpinionStatisticsController,
      ],
      providers: [
        OpinionRequestsService,
        AuditService,
        JwtStrategy,
        ...workflowProviders(fixtures),
      ],
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

  afterEach(async () => {
    await app.close();
    infoSpy.mockRestore();
  });

  async function createRequest(title = 'Hybrid work policy'): Promise<number> {
    const response = await request(app.getHttpServer())
      .post(`${BASE}/opinion-requests`)
      .auth(tokenFor(actors.requester), { type: 'bearer' })
      .send({
        title,
        departmentId: HOME_DEPARTMENT_ID,
        categoryId: fixtures.categoryId,
      })
      .expect(201);
    return response.body.id;
  }

  // ============================================================================
  // Authentication
  // ============================================================================
  describe('Authentication', () => {
    it('should reject requests without a token', async () => {
      await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests`)
        .expect(401);
    });

    it('should reject tokens of inactive accounts', async () => {
      await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests`)
        .auth(tokenFor({ ...actors.requester, isActive: false }), {
          type: 'bearer',
        })
        .expect(401);
    });

    it('should reject tokens signed with another secret', async () => {
      const forged = new JwtService({ secret: 'other-secret' }).sign({
        id: actors.requester.id,
        role: { id: actors.requester.role },
      });

      await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests`)
        .auth(forged, { type: 'bearer' })
        .expect(401);
    });
  });

  // ============================================================================
  // Requests
  // ============================================================================
  describe('POST /opinion-requests', () => {
    it('should create an unassigned request', async () => {
      const response = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .send({
          title: 'Hybrid work policy',
          departmentId: HOME_DEPARTMENT_ID,
          categoryId: fixtures.categoryId,
          priority: 'high',
          requestStatement: 'Should staff work remotely two days a week?',
        })
        .expect(201);

      expect(response.body).toMatchObject({
        title: 'Hybrid work policy',
        status: 'unassigned',
        priority: 'high',
        version: 1,
        requesterId: actors.requester.id,
        requestStatement: 'Should staff work remotely two days a week?',
        assignments: [],
        documents: [],
      });
      expect(response.body.referenceNumber).toMatch(/^OPN-[0-9A-F]{8}$/);
    });

    it('should accept files in a multipart request', async () => {
      const response = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .field('title', 'Budget review')
        .field('departmentId', String(HOME_DEPARTMENT_ID))
        .field('categoryId', String(fixtures.categoryId))
        .attach('files', Buffer.from('budget figures'), 'budget.pdf')
        .expect(201);

      expect(response.body.documents).toHaveLength(1);
      expect(response.body.documents[0]).toMatchObject({
        fileName: 'budget.pdf',
        fileSize: 14,
      });
      expect(response.body.documents[0].filePath).toBeUndefined();

      const download = await request(app.getHttpServer())
        .get(
          `${BASE}/opinion-requests/documents/${response.body.documents[0].id}/download`,
        )
        .auth(tokenFor(actors.outsider), { type: 'bearer' })
        .expect(200);

      expect(download.headers['content-type']).toBe('application/octet-stream');
      expect(download.headers['content-disposition']).toBe(
        'attachment; filename="budget.pdf"',
      );
    });

    it('should reject the whole request when a file type is not allowed', async () => {
      const response = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .field('title', 'Suspicious')
        .field('departmentId', String(HOME_DEPARTMENT_ID))
        .field('categoryId', String(fixtures.categoryId))
        .attach('files', Buffer.from('fine'), 'fine.pdf')
        .attach('files', Buffer.from('MZ'), 'malware.exe')
        .expect(400);

      expect(response.body.message).toBe(
        'File type not allowed: malware.exe. Allowed types: pdf, doc, docx, xls, xlsx',
      );
      expect(fixtures.store.tables.opinionRequests).toHaveLength(0);
    });

    it('should validate the body', async () => {
      const response = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .send({ departmentId: HOME_DEPARTMENT_ID, categoryId: 0 })
        .expect(400);

      expect(response.body.errors.title).toBeDefined();
      expect(response.body.errors.categoryId).toBeDefined();
    });
  });

  describe('GET /opinion-requests', () => {
    it('should list newest first with pagination metadata', async () => {
      await createRequest('Older');
      await createRequest('Newer');

      const response = await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests`)
        .query({ limit: 1 })
        .auth(tokenFor(actors.outsider), { type: 'bearer' })
        .expect(200);

      expect(response.body).toMatchObject({
        total: 2,
        skip: 0,
        limit: 1,
        hasNextPage: true,
      });
      expect(response.body.data).toHaveLength(1);
      expect(response.body.data[0].status).toBe('unassigned');
    });
  });

  describe('PATCH /opinion-requests/:id', () => {
    it('should answer 409 for a stale expected version', async () => {
      const id = await createRequest();
      await request(app.getHttpServer())
        .patch(`${BASE}/opinion-requests/${id}`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .send({ title: 'First edit', expectedVersion: 1 })
        .expect(200);

      await request(app.getHttpServer())
        .patch(`${BASE}/opinion-requests/${id}`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .send({ title: 'Second edit', expectedVersion: 1 })
        .expect(409);
    });

    it('should answer 403 for someone who is neither requester nor manager', async () => {
      const id = await createRequest();

      await request(app.getHttpServer())
        .patch(`${BASE}/opinion-requests/${id}`)
        .auth(tokenFor(actors.outsider), { type: 'bearer' })
        .send({ title: 'Not mine' })
        .expect(403);
    });
  });

  describe('DELETE /opinion-requests/:id', () => {
    it('should soft delete and then answer 404', async () => {
      const id = await createRequest();

      await request(app.getHttpServer())
        .delete(`${BASE}/opinion-requests/${id}`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .expect(204);

      await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests/${id}`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .expect(404);
    });
  });

  // ============================================================================
  // Full workflow
  // ============================================================================
  describe('Full workflow', () => {
    it('should take a request from creation to head approval', async () => {
      const id = await createRequest();

      const home = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests/${id}/assignments`)
        .auth(tokenFor(actors.coordinator), { type: 'bearer' })
        .send({ departmentId: HOME_DEPARTMENT_ID, expertId: EXPERT_ID })
        .expect(201);
      expect(home.body.request.status).toBe('assigned_to_expert');
      expect(home.body.assignment.isPrimary).toBe(true);
      expect(home.body.communication).toBeNull();

      const finance = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests/${id}/assignments`)
        .auth(tokenFor(actors.coordinator), { type: 'bearer' })
        .send({
          departmentId: FINANCE_DEPARTMENT_ID,
          expertId: FINANCE_EXPERT_ID,
        })
        .expect(201);
      expect(finance.body.assignment.isPrimary).toBe(false);
      expect(finance.body.communication).toMatchObject({
        fromDepartmentId: HOME_DEPARTMENT_ID,
        toDepartmentId: FINANCE_DEPARTMENT_ID,
        status: 'pending',
      });

      const created = await request(app.getHttpServer())
        .post(`${BASE}/opinions`)
        .auth(tokenFor(actors.expert), { type: 'bearer' })
        .send({
          requestId: id,
          departmentId: HOME_DEPARTMENT_ID,
          content: 'Two remote days are workable',
        })
        .expect(201);
      expect(created.body.opinion.status).toBe('draft');
      expect(created.body.request.status).toBe('in_review');
      const opinionId = created.body.opinion.id;

      await request(app.getHttpServer())
        .post(`${BASE}/opinions/${opinionId}/submit`)
        .auth(tokenFor(actors.expert), { type: 'bearer' })
        .expect(200);

      const reviewed = await request(app.getHttpServer())
        .post(`${BASE}/opinions/${opinionId}/review`)
        .auth(tokenFor(actors.head), { type: 'bearer' })
        .send({ approved: true, comments: 'Agreed' })
        .expect(200);
      expect(reviewed.body.opinion).toMatchObject({
        status: 'approved',
        reviewedBy: actors.head.id,
        reviewComments: 'Agreed',
      });
      expect(reviewed.body.request).toMatchObject({
        status: 'head_approved',
        version: 6,
      });

      const history = await request(app.getHttpServer())
        .get(`${BASE}/opinion-requests/${id}/history`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .expect(200);
      expect(
        history.body.map((entry: { actionType: string }) => entry.actionType),
      ).toEqual([
        'created',
        'assigned',
        'assigned',
        'opinion_created',
        'opinion_submitted',
        'opinion_reviewed',
      ]);

      await request(app.getHttpServer())
        .patch(`${BASE}/opinion-requests/${id}/status`)
        .auth(tokenFor(actors.coordinator), { type: 'bearer' })
        .send({ status: 'in_review' })
        .expect(400);
    });

    it('should refuse an assignment without the permission', async () => {
      const id = await createRequest();

      const response = await request(app.getHttpServer())
        .post(`${BASE}/opinion-requests/${id}/assignments`)
        .auth(tokenFor(actors.requester), { type: 'bearer' })
        .send({ departmentId: HOME_DEPARTMENT_ID })
        .expect(403);

      expect(response.body.message).toBe(
        'Missing permission to assign opinion requests: requires assign_experts or manage_opinion_requests',
      );
    });
  });

  // ============================================================================
  // Statistics
  // ============================================================================
  describe('GET /opinion-statistics/departments/:departmentId', () => {
    it('should be limited to heads and administrators', async () => {
      await request(app.getHttpServer())
        .get(`${BASE}/opinion-statistics/departments/${HOME_DEPARTMENT_ID}`)
        .auth(tokenFor(actors.expert), { type: 'bearer' })
        .expect(403);
    });

    it('should report department counts', async () => {
      await createRequest();

      const response = await request(app.getHttpServer())
        .get(`${BASE}/opinion-statistics/departments/${HOME_DEPARTMENT_ID}`)
        .auth(tokenFor(actors.head), { type: 'bearer' })
        .expect(200);

      expect(response.body).toEqual({
        departmentId: HOME_DEPARTMENT_ID,
        totalRequests: 1,
        completedRequests: 0,
        pendingRequests: 1,
        rejectedRequests: 0,
        averageCompletionTime: 0,
      });
    });
  });
});
