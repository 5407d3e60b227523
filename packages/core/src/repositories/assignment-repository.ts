import type { Assignment, AssignmentId, AssignmentRecord } from '../types/assignment.js';
import { serializeAssignment, withStatus } from '../types/assignment.js';
import type { AssignmentStatus } from '../types/assignment-status.js';
import type { ValidationResult } from '../types/results.js';
import type { CreateAssignmentInput } from '../schema/assignment.js';
import type { RawInput } from '../schema/common.js';
import { validateAssignmentRecord, validateAssignmentInput } from '../validation/index.js';
import { ValidationError } from '../errors.js';
import { JsonRepository } from './json-repository.js';

export class AssignmentRepository extends JsonRepository<Assignment, AssignmentRecord> {
  protected readonly entityName = 'assignment';

  /**
   * Validate the input, assign the next ID and persist the whole collection.
   * A Date given as dueDate is stored as-is; strings are parsed as ISO-8601.
   */
  create(input: CreateAssignmentInput | RawInput): Assignment {
    const parsed = validateAssignmentInput(input);
    if (!parsed.ok) throw new ValidationError(this.entityName, parsed.error);

    const assignments = this.getAll();
    const assignment: Assignment = {
      id: this.nextId(assignments),
      title: parsed.value.title,
      description: parsed.value.description,
      subject: parsed.value.subject,
      dueDate: parsed.value.dueDate,
      status: parsed.value.status,
      priority: parsed.value.priority,
      estimatedHours: parsed.value.estimatedHours,
      createdAt: this.now(),
    };

    this.persist([...assignments, assignment]);
    this.logger.info(`Created assignment with ID: ${assignment.id}`);
    return assignment;
  }

  /** Set the status of one assignment. Returns false, writing nothing, when the ID is unknown. */
  updateStatus(id: AssignmentId, status: AssignmentStatus): boolean {
    const assignments = this.getAll();
    const index = assignments.findIndex(a => a.id === id);
    const current = assignments[index];
    if (current === undefined) return false;

    assignments[index] = withStatus(current, status);
    this.persist(assignments);
    this.logger.info(`Set assignment ${id} to ${status}`);
    return true;
  }

  protected validate(raw: unknown): ValidationResult<Assignment> {
    return validateAssignmentRecord(raw);
  }

  protected serialize(assignment: Assignment): AssignmentRecord {
    return serializeAssignment(assignment);
  }
}
