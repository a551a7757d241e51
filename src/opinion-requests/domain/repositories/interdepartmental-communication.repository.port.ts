import {
  InterdepartmentalCommunication,
  NewInterdepartmentalCommunication,
} from '../entities/interdepartmental-communication.entity';

export abstract class InterdepartmentalCommunicationRepository {
  abstract create(
    data: NewInterdepartmentalCommunication,
  ): Promise<InterdepartmentalCommunication>;

  abstract findByRequestId(
    requestId: number,
  ): Promise<InterdepartmentalCommunication[]>;
}
