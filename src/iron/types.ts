import { z } from 'zod';

/** A queued or finished run of a code package. Unlisted fields are kept as returned. */
export const taskSchema = z
  .object({
    id: z.string(),
    project_id: z.string().optional(),
    code_id: z.string().optional(),
    code_name: z.string().optional(),
    status: z.string().optional(),
    cluster: z.string().optional(),
    payload: z.string().optional(),
    msg: z.string().optional(),
    duration: z.number().optional(),
    run_times: z.number().optional(),
    timeout: z.number().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    start_time: z.string().optional(),
    end_time: z.string().optional(),
  })
  .passthrough();

export type Task = z.output<typeof taskSchema>;

/** A recurring or delayed trigger that queues tasks. */
export const scheduleSchema = z
  .object({
    id: z.string(),
    project_id: z.string().optional(),
    code_name: z.string().optional(),
    status: z.string().optional(),
    payload: z.string().optional(),
    cluster: z.string().optional(),
    start_at: z.string().optional(),
    end_at: z.string().optional(),
    next_start: z.string().optional(),
    last_run_time: z.string().optional(),
    run_every: z.number().optional(),
    run_times: z.number().optional(),
    run_count: z.number().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export type Schedule = z.output<typeof scheduleSchema>;

/** An uploaded code package tasks run. */
export const codeSchema = z
  .object({
    id: z.string(),
    project_id: z.string().optional(),
    name: z.string(),
    image: z.string().optional(),
    rev: z.number().optional(),
    latest_change: z.string().optional(),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export type Code = z.output<typeof codeSchema>;

/** Reply of calls that only acknowledge, such as cancel or delete. */
export const messageSchema = z.object({ msg: z.string() }).passthrough();

export type Message = z.output<typeof messageSchema>;

/** A task to queue. */
export interface QueueTaskInput {
  code_name: string;
  payload: string;
  cluster?: string;
  /** Seconds before the task is killed. */
  timeout?: number;
  /** Seconds to wait before the task starts. */
  delay?: number;
}

/** A schedule to create. Either `run_every` or `run_times` should be set for repeated runs. */
export interface CreateScheduleInput {
  code_name: string;
  payload: string;
  cluster?: string;
  /** RFC 3339 time of the first run. */
  start_at?: string;
  /** Seconds between runs. */
  run_every?: number;
  run_times?: number;
  end_at?: string;
  timeout?: number;
}

/** Filters for listing tasks. */
export type TaskFilter = {
  code_name?: string;
  status?: string;
  page?: number;
  per_page?: number;
};
