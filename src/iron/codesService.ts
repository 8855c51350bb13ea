import { z } from 'zod';
import type { ServiceClient } from '../core/client.js';
import { structured } from '../core/destination.js';
import type { OptionFunc } from '../core/request.js';
import type { ResponseWrap } from '../core/response.js';
import { type Code, codeSchema, type Message, messageSchema } from './types.js';

const codeListSchema = z.object({ codes: z.array(codeSchema) });

/**
 * Code packages registered with the project.
 */
export class CodesService {
  #client: ServiceClient;

  constructor(client: ServiceClient) {
    this.#client = client;
  }

  getCodes(...options: OptionFunc[]): Promise<ResponseWrap<Code[]>> {
    return this.#client.do('GET', 'codes', null, options, structured(codeListSchema.transform((reply) => reply.codes)));
  }

  getCode(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Code>> {
    return this.#client.do('GET', `codes/${id}`, null, options, structured(codeSchema));
  }

  /** Removes a code package and its revisions. */
  deleteCode(id: string, ...options: OptionFunc[]): Promise<ResponseWrap<Message>> {
    return this.#client.do('DELETE', `codes/${id}`, null, options, structured(messageSchema));
  }
}
