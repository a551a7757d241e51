import { EntityManager, Repository } from 'typeorm';
import {
  NewRequestDocument,
  RequestDocument,
} from '../../../../domain/entities/request-document.entity';
import { RequestDocumentRepository } from '../../../../domain/repositories/request-document.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { RequestDocumentEntity } from '../entities/request-document.entity';
import { RequestDocumentMapper } from '../mappers/request-document.mapper';

export class RequestDocumentRelationalRepository
  implements RequestDocumentRepository
{
  private readonly repository: Repository<RequestDocumentEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(RequestDocumentEntity);
  }

  async findById(id: number): Promise<NullableType<RequestDocument>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? RequestDocumentMapper.toDomain(entity) : null;
  }

  async findByRequestId(requestId: number): Promise<RequestDocument[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => RequestDocumentMapper.toDomain(entity));
  }

  async create(data: NewRequestDocument): Promise<RequestDocument> {
    const saved = await this.repository.save(
      RequestDocumentMapper.toPersistence(data),
    );
    return RequestDocumentMapper.toDomain(saved);
  }

  async delete(id: number): Promise<void> {
    await this.repository.delete(id);
  }
}
