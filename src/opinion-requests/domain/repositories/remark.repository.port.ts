import { NewRemark, Remark } from '../entities/remark.entity';

export abstract class RemarkRepository {
  abstract create(data: NewRemark): Promise<Remark>;

  abstract findByRequestId(requestId: number): Promise<Remark[]>;
}
