import { InvalidStateTransitionException } from '../exceptions/workflow.exceptions';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';

const ASSIGNED_TARGETS = [
  WorkflowStatusName.ASSIGNED_TO_DEPARTMENT,
  WorkflowStatusName.ASSIGNED_TO_EXPERT,
  WorkflowStatusName.IN_REVIEW,
  WorkflowStatusName.ADDITIONAL_INFO_REQUESTED,
  WorkflowStatusName.PENDING_OTHER_DEPARTMENT,
];

const SIDE_BRANCH_TARGETS = [
  WorkflowStatusName.IN_REVIEW,
  WorkflowStatusName.ASSIGNED_TO_DEPARTMENT,
  WorkflowStatusName.ASSIGNED_TO_EXPERT,
];

/**
 * Opinion Request State Machine
 *
 * Main flow:
 *   unassigned → assigned_to_department | assigned_to_expert
 *     → in_review → expert_opinion_submitted
 *     → head_review_pending → head_approved | rejected
 *
 * additional_info_requested and pending_other_department are side branches
 * that re-enter at in_review or at an assignment. A submitted opinion may
 * also be decided directly (expert_opinion_submitted → head_approved |
 * rejected). head_approved, rejected and completed are terminal.
 */
export class OpinionRequestStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    WorkflowStatusName,
    WorkflowStatusName[]
  > = new Map([
    [
      WorkflowStatusName.UNASSIGNED,
      [
        WorkflowStatusName.ASSIGNED_TO_DEPARTMENT,
        WorkflowStatusName.ASSIGNED_TO_EXPERT,
      ],
    ],
    [WorkflowStatusName.ASSIGNED_TO_DEPARTMENT, ASSIGNED_TARGETS],
    [WorkflowStatusName.ASSIGNED_TO_EXPERT, ASSIGNED_TARGETS],
    [
      WorkflowStatusName.IN_REVIEW,
      [
        WorkflowStatusName.EXPERT_OPINION_SUBMITTED,
        WorkflowStatusName.ADDITIONAL_INFO_REQUESTED,
        WorkflowStatusName.PENDING_OTHER_DEPARTMENT,
        WorkflowStatusName.ASSIGNED_TO_DEPARTMENT,
        WorkflowStatusName.ASSIGNED_TO_EXPERT,
      ],
    ],
    [WorkflowStatusName.ADDITIONAL_INFO_REQUESTED, SIDE_BRANCH_TARGETS],
    [WorkflowStatusName.PENDING_OTHER_DEPARTMENT, SIDE_BRANCH_TARGETS],
    [
      WorkflowStatusName.EXPERT_OPINION_SUBMITTED,
      [
        WorkflowStatusName.IN_REVIEW,
        WorkflowStatusName.HEAD_REVIEW_PENDING,
        WorkflowStatusName.HEAD_APPROVED,
        WorkflowStatusName.REJECTED,
      ],
    ],
    [
      WorkflowStatusName.HEAD_REVIEW_PENDING,
      [WorkflowStatusName.HEAD_APPROVED, WorkflowStatusName.REJECTED],
    ],
    // head_approved, rejected and completed are terminal
  ]);

  private static readonly TERMINAL_STATES: ReadonlySet<WorkflowStatusName> =
    new Set([
      WorkflowStatusName.HEAD_APPROVED,
      WorkflowStatusName.REJECTED,
      WorkflowStatusName.COMPLETED,
    ]);

  static isValidTransition(
    fromStatus: WorkflowStatusName,
    toStatus: WorkflowStatusName,
  ): boolean {
    if (this.isTerminal(fromStatus)) {
      return false;
    }

    // Same state is valid (idempotent) for every non-terminal state
    if (fromStatus === toStatus) {
      return true;
    }

    const validTargets = this.VALID_TRANSITIONS.get(fromStatus);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(toStatus);
  }

  /**
   * @throws InvalidStateTransitionException if the transition is not legal
   */
  static validateTransition(
    fromStatus: WorkflowStatusName,
    toStatus: WorkflowStatusName,
  ): void {
    if (!this.isValidTransition(fromStatus, toStatus)) {
      const validTargets = this.getValidTargetStates(fromStatus);
      throw new InvalidStateTransitionException(
        fromStatus,
        toStatus,
        `Invalid state transition: ${fromStatus} → ${toStatus}. ` +
          `Valid transitions from ${fromStatus}: ${validTargets.join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(
    fromStatus: WorkflowStatusName,
  ): WorkflowStatusName[] {
    return this.VALID_TRANSITIONS.get(fromStatus) || [];
  }

  static isTerminal(status: WorkflowStatusName): boolean {
    return this.TERMINAL_STATES.has(status);
  }

  /**
   * Statuses reachable through a manual status change rather than through
   * assignment, opinion or review operations.
   */
  static isManuallySettable(status: WorkflowStatusName): boolean {
    return (
      status === WorkflowStatusName.IN_REVIEW ||
      status === WorkflowStatusName.ADDITIONAL_INFO_REQUESTED ||
      status === WorkflowStatusName.PENDING_OTHER_DEPARTMENT ||
      status === WorkflowStatusName.HEAD_REVIEW_PENDING
    );
  }
}
