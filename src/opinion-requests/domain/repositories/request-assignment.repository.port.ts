import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewRequestAssignment,
  RequestAssignment,
  RequestAssignmentChanges,
} from '../entities/request-assignment.entity';

export abstract class RequestAssignmentRepository {
  abstract findById(id: number): Promise<NullableType<RequestAssignment>>;

  /**
   * Oldest first.
   */
  abstract findByRequestId(requestId: number): Promise<RequestAssignment[]>;

  /**
   * Clear `isPrimary` on every assignment of the request.
   */
  abstract demotePrimary(requestId: number): Promise<void>;

  abstract create(data: NewRequestAssignment): Promise<RequestAssignment>;

  abstract update(
    id: number,
    changes: RequestAssignmentChanges,
  ): Promise<RequestAssignment>;
}
