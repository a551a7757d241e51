import {
  NewRequestDocument,
  RequestDocument,
} from '../../../../domain/entities/request-document.entity';
import { RequestDocumentEntity } from '../entities/request-document.entity';

export class RequestDocumentMapper {
  static toDomain(entity: RequestDocumentEntity): RequestDocument {
    return {
      id: entity.id,
      requestId: entity.requestId,
      fileName: entity.fileName,
      storedName: entity.storedName,
      filePath: entity.filePath,
      fileType: entity.fileType,
      fileSize: entity.fileSize,
      uploadedBy: entity.uploadedBy,
      remarks: entity.remarks,
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(domain: NewRequestDocument): RequestDocumentEntity {
    const entity = new RequestDocumentEntity();
    entity.requestId = domain.requestId;
    entity.fileName = domain.fileName;
    entity.storedName = domain.storedName;
    entity.filePath = domain.filePath;
    entity.fileType = domain.fileType;
    entity.fileSize = domain.fileSize;
    entity.uploadedBy = domain.uploadedBy;
    entity.remarks = domain.remarks;
    return entity;
  }
}
