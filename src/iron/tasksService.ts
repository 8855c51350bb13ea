import { z } from 'zod';
import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import { withContentType, withQuery } from '../core/options.js';
import type { OptionFunc } from '../core/request.js';
import type { ResponseWrap } from '../core/response.js';
import {
  type Message,
  messageSchema,
  type QueueTaskInput,
  type Task,
  type TaskFilter,
  taskSchema,
} from './types.js';

const queuedSchema = z.object({
  msg: z.string().optional(),
  tasks: z.array(z.object({ id: z.string() })),
});

const taskListSchema = z.object({ tasks: z.array(taskSchema) });

/**
 * Queues, inspects and cancels tasks of the project.
 */
export class TasksService {
  #client: ServiceClient;

  constructor(client: ServiceClient) {
    this.#client = client;
  }

  /**
   * Queues tasks in one call. The reply lists the ids of the new tasks, in order.
   */
  async queueTasks(tasks: QueueTaskInput[], ...options: OptionFunc[]): Promise<ResponseWrap<string[]>> {
    if (tasks.length === 0) {
      return [new Error('error at least one task is required'), null];
    }

    return this.#client.do(
      'POST',
      'tasks',
      JSON.stringify({ tasks }),
      [withContentType('application/json'), ...options],
      structured(queuedSchema.transform((reply) => reply.tasks.map((task) => task.id))),
    );
  }

  /** Fetches one task, including its status and run times. */
  getTask(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Task>> {
    return this.#client.do('GET', `tasks/${id}`, null, options, structured(taskSchema));
  }

  /** Lists tasks, optionally filtered by code package or status. */
  getTasks(filter: TaskFilter = {}, ...options: OptionFunc[]): Promise<ResponseWrap<Task[]>> {
    return this.#client.do(
      'GET',
      'tasks',
      null,
      [withQuery(filter), ...options],
      structured(taskListSchema.transform((reply) => reply.tasks)),
    );
  }

  /** Cancels a queued or running task. */
  cancelTask(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Message>> {
    return this.#client.do('POST', `tasks/${id}/cancel`, null, options, structured(messageSchema));
  }
}
