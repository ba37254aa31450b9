// BOUNDARY - Outbound contract with the task-tracking API
// Field names and repeat type ordinals are fixed by the downstream service

import { z } from 'zod';

export interface AddTaskRequestDto {
  taskName: string;
  taskStart: number;      // Unix epoch seconds
  taskRepeatInfo: number; // RecurrenceRule parameter
  taskRepeatType: number; // 0=no repeat 1=monthly 2=monthly on day 3=specified days 4=with interval
}

export const AddTaskRequestDtoSchema = z.object({
  taskName: z.string().min(1),
  taskStart: z.number().int(),
  taskRepeatInfo: z.number().int().nonnegative(),
  taskRepeatType: z.number().int().min(0).max(4)
}).strict();

// Example request:
// POST http://localhost:5000/addTask
// {
//   "taskName": "Water plants",
//   "taskStart": 1710487800,
//   "taskRepeatInfo": 7,
//   "taskRepeatType": 4
// }
