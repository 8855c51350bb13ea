import { z } from 'zod';
import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import { withContentType } from '../core/options.js';
import type { OptionFunc } from '../core/request.js';
import type { ResponseWrap } from '../core/response.js';
import { type CreateScheduleInput, type Message, messageSchema, type Schedule, scheduleSchema } from './types.js';

const createdSchema = z.object({
  msg: z.string().optional(),
  schedules: z.array(z.object({ id: z.string() })),
});

const scheduleListSchema = z.object({ schedules: z.array(scheduleSchema) });

/**
 * Schedules that queue tasks at a later time or on an interval.
 */
export class SchedulesService {
  #client: ServiceClient;

  constructor(client: ServiceClient) {
    this.#client = client;
  }

  /** Creates schedules; the reply lists their ids in order. */
  async createSchedules(schedules: CreateScheduleInput[], ...options: OptionFunc[]): Promise<ResponseWrap<string[]>> {
    if (schedules.length === 0) {
      return [new Error('error at least one schedule is required'), null];
    }

    return this.#client.do(
      'POST',
      'schedules',
      JSON.stringify({ schedules }),
      [withContentType('application/json'), ...options],
      structured(createdSchema.transform((reply) => reply.schedules.map((schedule) => schedule.id))),
    );
  }

  getSchedule(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Schedule>> {
    return this.#client.do('GET', `schedules/${id}`, null, options, structured(scheduleSchema));
  }

  getSchedules(...options: OptionFunc[]): Promise<ResponseWrap<Schedule[]>> {
    return this.#client.do(
      'GET',
      'schedules',
      null,
      options,
      structured(scheduleListSchema.transform((reply) => reply.schedules)),
    );
  }

  /** Stops a schedule; tasks it already queued keep running. */
  cancelSchedule(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Message>> {
    return this.#client.do('POST', `schedules/${id}/cancel`, null, options, structured(messageSchema));
  }
}
