import { Readable } from 'stream';
import {
  HOME_DEPARTMENT_ID,
  WorkflowHarness,
  actors,
  createWorkflowHarness,
  pdf,
} from '../../../../test/utils/workflow-test-harness';
import { PermissionEnum } from '../../../roles/permission.enum';
import { OpinionRequest } from '../entities/opinion-request.entity';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import { DependencyFailureException } from '../exceptions/workflow.exceptions';

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('RequestDocumentDomainService', () => {
  let harness: WorkflowHarness;
  let request: OpinionRequest;

  beforeEach(async () => {
    harness = await createWorkflowHarness();
    const created = await harness.workflow.createRequest(actors.requester, {
      title: 'Procurement rules',
      departmentId: HOME_DEPARTMENT_ID,
      categoryId: harness.categoryId,
    });
    request = created.request;
  });

  describe('uploadDocuments', () => {
    it('should store every file and record one history row', async () => {
      const result = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('terms.pdf'), pdf('prices.pdf')],
        'Supporting material',
      );

      expect(result.documents).toHaveLength(2);
      expect(result.documents[0]).toMatchObject({
        requestId: request.id,
        fileName: 'terms.pdf',
        fileType: 'application/pdf',
        uploadedBy: actors.requester.id,
        remarks: 'Supporting material',
      });
      expect(result.request.version).toBe(2);
      expect(harness.fileStorage.files.size).toBe(2);

      const history = await harness.workflow.getHistory(request.id);
      expect(history[1]).toMatchObject({
        actionType: WorkflowActionType.DOCUMENTS_UPLOADED,
        actionDetails: {
          fileNames: ['terms.pdf', 'prices.pdf'],
          documentIds: result.documents.map((document) => document.id),
          remarks: 'Supporting material',
        },
      });
    });

    it('should require at least one file', async () => {
      await expect(
        harness.documents.uploadDocuments(request.id, actors.requester, []),
      ).rejects.toThrow('At least one file is required');
    });

    it('should store nothing when one file of the batch is not allowed', async () => {
      await expect(
        harness.documents.uploadDocuments(request.id, actors.requester, [
          pdf('terms.pdf'),
          pdf('malware.exe'),
        ]),
      ).rejects.toThrow(
        'File type not allowed: malware.exe. Allowed types: pdf, doc, docx, xls, xlsx',
      );

      expect(await harness.documents.listForRequest(request.id)).toHaveLength(0);
      expect(harness.fileStorage.files.size).toBe(0);
      const details = await harness.workflow.getRequest(request.id);
      expect(details.request.version).toBe(1);
    });

    it('should remove files already written when storage fails mid-batch', async () => {
      harness.fileStorage.failOnSave = 3;

      await expect(
        harness.documents.uploadDocuments(request.id, actors.requester, [
          pdf('a.pdf'),
          pdf('b.pdf'),
          pdf('c.pdf'),
        ]),
      ).rejects.toThrow(new DependencyFailureException('File storage', 'disk full'));

      expect(harness.fileStorage.files.size).toBe(0);
      expect(harness.store.tables.documents).toHaveLength(0);
      const history = await harness.workflow.getHistory(request.id);
      expect(history).toHaveLength(1);
    });
  });

  describe('deleteDocument', () => {
    it('should delete the row and the stored file', async () => {
      const { documents } = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('old.pdf')],
      );

      const deleted = await harness.documents.deleteDocument(
        documents[0].id,
        actors.requester,
      );

      expect(deleted.fileName).toBe('old.pdf');
      expect(harness.fileStorage.files.has(deleted.filePath)).toBe(false);
      expect(await harness.documents.listForRequest(request.id)).toHaveLength(0);
      const history = await harness.workflow.getHistory(request.id);
      expect(history[2]).toMatchObject({
        actionType: WorkflowActionType.DOCUMENT_DELETED,
        actionDetails: { documentId: documents[0].id, fileName: 'old.pdf' },
      });
    });

    it('should keep the deletion when the stored file is already gone', async () => {
      const { documents } = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('gone.pdf')],
      );
      harness.fileStorage.files.clear();

      await harness.documents.deleteDocument(documents[0].id, actors.requester);

      expect(harness.store.tables.documents).toHaveLength(0);
    });

    it('should only let the uploader or a document manager delete', async () => {
      const { documents } = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('keep.pdf')],
      );

      await expect(
        harness.documents.deleteDocument(documents[0].id, actors.outsider),
      ).rejects.toThrow(
        'Only the uploader or a document manager can delete this document',
      );

      await harness.documents.deleteDocument(documents[0].id, {
        ...actors.outsider,
        permissions: [PermissionEnum.manageDocuments],
      });
      expect(harness.store.tables.documents).toHaveLength(0);
    });

    it('should report a missing document', async () => {
      await expect(
        harness.documents.deleteDocument(404, actors.requester),
      ).rejects.toThrow('Document not found');
    });
  });

  describe('downloadDocument', () => {
    it('should stream the stored contents', async () => {
      const { documents } = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('memo.pdf', 'memo contents')],
      );

      const download = await harness.documents.downloadDocument(
        documents[0].id,
      );

      expect(download.document.fileName).toBe('memo.pdf');
      expect(await readAll(download.stream)).toBe('memo contents');
    });

    it('should not serve documents of a deleted request', async () => {
      const { documents } = await harness.documents.uploadDocuments(
        request.id,
        actors.requester,
        [pdf('memo.pdf')],
      );
      await harness.workflow.deleteRequest(request.id, actors.requester);

      await expect(
        harness.documents.downloadDocument(documents[0].id),
      ).rejects.toThrow('Document not found');
    });
  });
});
