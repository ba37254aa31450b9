// OPERATORS - Business orchestration for the task form
// Validate the submission, translate it into the downstream schema, relay it

import { AddTaskRequestDto, AddTaskRequestDtoSchema } from '../boundary/dto/add-task-request.dto';
import { TaskFormDto } from '../boundary/dto/task-form.dto';
import { TaskFormCheckpoint } from '../core-abstractions/checkpoints/task-form.checkpoint';
import { TaskCreationRequest } from '../core-abstractions/entities/task-creation-request.entity';
import { TaskFormError } from '../core-abstractions/errors/task-form.errors';
import { InstantPolicy } from '../core-abstractions/policies/instant.policy';
import { ITaskTrackerGateway } from '../core-abstractions/ports/task-tracker.gateway';
import { logger, PerformanceTimer } from '../shared/logger';

const COMPONENT = 'add-task';

export class AddTaskOperator {
  constructor(
    private readonly checkpoint: TaskFormCheckpoint,
    private readonly instantPolicy: InstantPolicy,
    private readonly gateway: ITaskTrackerGateway
  ) {}

  // Pure translation: form fields -> request entity. Throws TaskFormError on the first bad field.
  prepareTask(dto: TaskFormDto): TaskCreationRequest {
    const report = this.checkpoint.run(dto);
    if (!report.passed) {
      this.logRejection(report.error, report.evaluatedAt);
      throw report.error;
    }

    try {
      return TaskCreationRequest.create(report.fields, this.instantPolicy);
    } catch (error) {
      if (error instanceof TaskFormError) {
        this.logRejection(error, report.evaluatedAt);
      }
      throw error;
    }
  }

  // Form fields -> wire payload, ready to be posted as-is
  preparePayload(dto: TaskFormDto): AddTaskRequestDto {
    return this.toCheckedPayload(this.prepareTask(dto));
  }

  // Business use case: "Add a task from a form submission"
  async addTask(dto: TaskFormDto): Promise<AddTaskRequestDto> {
    const request = this.prepareTask(dto);
    const payload = this.toCheckedPayload(request);

    const timer = new PerformanceTimer(COMPONENT, 'relay');
    try {
      await this.gateway.addTask(payload);
    } catch (error) {
      logger.error(COMPONENT, 'Relaying task failed', error instanceof Error ? error : null, {
        taskName: payload.taskName
      });
      throw error;
    }
    timer.end({ taskName: payload.taskName });

    logger.info(COMPONENT, 'Task relayed', {
      ...payload,
      repeatType: request.recurrence.type.value,
      instantPolicy: this.instantPolicy.name
    });
    return payload;
  }

  private toCheckedPayload(request: TaskCreationRequest): AddTaskRequestDto {
    return AddTaskRequestDtoSchema.parse(request.toPayload());
  }

  private logRejection(error: TaskFormError, evaluatedAt: Date): void {
    logger.validation(COMPONENT, error.field, error.reason, {
      value: error.value,
      message: error.message,
      evaluatedAt: evaluatedAt.toISOString()
    });
  }
}
