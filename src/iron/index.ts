/**
 * Job scheduler (iron) client.
 * @module
 */

export { IronClient, type IronClientOptions } from './client.js';
export { CodesService } from './codesService.js';
export { SchedulesService } from './schedulesService.js';
export { TasksService } from './tasksService.js';
export {
  type Code,
  type CreateScheduleInput,
  codeSchema,
  type Message,
  messageSchema,
  type QueueTaskInput,
  type Schedule,
  scheduleSchema,
  type Task,
  type TaskFilter,
  taskSchema,
} from './types.js';
