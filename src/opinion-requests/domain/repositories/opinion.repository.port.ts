import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewOpinion,
  Opinion,
  OpinionChanges,
} from '../entities/opinion.entity';

export abstract class OpinionRepository {
  abstract findById(id: number): Promise<NullableType<Opinion>>;

  abstract findByRequestId(requestId: number): Promise<Opinion[]>;

  abstract create(data: NewOpinion): Promise<Opinion>;

  abstract update(id: number, changes: OpinionChanges): Promise<Opinion>;
}
