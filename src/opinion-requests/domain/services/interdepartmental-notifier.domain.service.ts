import { Injectable, Logger } from '@nestjs/common';
import { InterdepartmentalCommunication } from '../entities/interdepartmental-communication.entity';
import { OpinionRequest } from '../entities/opinion-request.entity';
import { RequestAssignment } from '../entities/request-assignment.entity';
import { CommunicationStatus } from '../enums/communication-status.enum';
import { WorkflowRepositories } from '../repositories/workflow-unit-of-work.port';

/**
 * Opens a pending communication when a request is assigned outside its
 * home department. Only invoked from the assignment flow.
 */
@Injectable()
export class InterdepartmentalNotifier {
  private readonly logger = new Logger(InterdepartmentalNotifier.name);

  async notifyAssignment(
    repositories: WorkflowRepositories,
    request: OpinionRequest,
    assignment: RequestAssignment,
  ): Promise<InterdepartmentalCommunication | null> {
    if (assignment.departmentId === request.departmentId) {
      return null;
    }

    const communication = await repositories.communications.create({
      requestId: request.id,
      fromDepartmentId: request.departmentId,
      toDepartmentId: assignment.departmentId,
      fromUserId: assignment.assignedBy,
      toUserId: assignment.expertId,
      subject: `Opinion requested: ${request.referenceNumber}`,
      content:
        assignment.remarks ??
        `Request "${request.title}" has been assigned to your department for an opinion.`,
      priority: request.priority,
      status: CommunicationStatus.PENDING,
      requiresResponse: true,
      dueDate: assignment.dueDate,
    });

    this.logger.log(
      `Communication ${communication.id} opened for request ${request.id}: ` +
        `department ${request.departmentId} → ${assignment.departmentId}`,
    );

    return communication;
  }
}
