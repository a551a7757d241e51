import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AuditService, WorkflowEventType } from './audit.service';

describe('AuditService', () => {
  let service: AuditService;
  let infoSpy: jest.SpyInstance;

  beforeEach(async () => {
    const mockConfig = {
      get: jest.fn((key: string) => {
        if (key === 'app.name') return 'Opinion Workflow API';
        if (key === 'app.nodeEnv') return 'test';
        return undefined;
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [AuditService, { provide: ConfigService, useValue: mockConfig }],
    }).compile();

    service = module.get<AuditService>(AuditService);
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('should write one JSON line per event', () => {
    service.logWorkflowEvent({
      userId: 7,
      event: WorkflowEventType.REQUEST_ASSIGNED,
      requestId: 12,
      success: true,
      metadata: { departmentId: 3 },
    });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(infoSpy.mock.calls[0][0]);
    expect(entry).toMatchObject({
      service: 'Opinion Workflow API',
      component: 'opinion-workflow',
      userId: 7,
      event: 'REQUEST_ASSIGNED',
      requestId: 12,
      success: true,
      environment: 'test',
      metadata: { departmentId: 3 },
    });
  });

  it('should redact emails and bearer tokens from error messages', () => {
    service.logWorkflowEvent({
      userId: 7,
      event: WorkflowEventType.WORKFLOW_ACTION_DENIED,
      success: false,
      errorMessage: 'denied for head@example.com using Bearer abc.def',
    });

    const entry = JSON.parse(infoSpy.mock.calls[0][0]);
    expect(entry.errorType).toBe(
      'denied for [EMAIL_REDACTED] using Bearer [TOKEN_REDACTED]',
    );
  });
});
