// BOUNDARY - External contract for the task form
// This DTO represents what the HTML form posts to us

import { z } from 'zod';

export const TASK_FORM_FIELDS = {
  START: 'task_start',
  TIME: 'task_time',
  NAME: 'task_name',
  REPEAT_INFO: 'repeat_info'
} as const;

export type TaskFormField = typeof TASK_FORM_FIELDS[keyof typeof TASK_FORM_FIELDS];

// Every field may be missing from a submission; the checkpoint decides what that means
export interface TaskFormDto {
  task_start?: string;
  task_time?: string;
  task_name?: string;
  repeat_info?: string;
}

// Unknown keys are dropped, non-string values are rejected
export const TaskFormDtoSchema = z.object({
  task_start: z.string().optional(),
  task_time: z.string().optional(),
  task_name: z.string().optional(),
  repeat_info: z.string().optional()
});

// Example submission:
// POST /
// task_start=2024-3-15&task_time=9%3A30&task_name=Water+plants&repeat_info=weekly
