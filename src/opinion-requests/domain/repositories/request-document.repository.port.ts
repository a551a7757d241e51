import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewRequestDocument,
  RequestDocument,
} from '../entities/request-document.entity';

export abstract class RequestDocumentRepository {
  abstract findById(id: number): Promise<NullableType<RequestDocument>>;

  abstract findByRequestId(requestId: number): Promise<RequestDocument[]>;

  abstract create(data: NewRequestDocument): Promise<RequestDocument>;

  abstract delete(id: number): Promise<void>;
}
