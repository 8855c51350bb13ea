import { z } from 'zod';

/** A file-like resource stored for a device. */
export const appResourceSchema = z.object({
  id: z.number(),
  deviceId: z.number(),
  name: z.string(),
  content: z.string(),
});

export type AppResource = z.output<typeof appResourceSchema>;

/** Fields of a resource to create. */
export interface CreateAppResourceInput {
  deviceId: number;
  serialNumber: string;
  groupId: string;
  name: string;
  content: string;
  isLocked: boolean;
}

/** Identifies the resource to delete. */
export interface DeleteAppResourceInput {
  id: number;
  name: string;
  serialNumber: string;
  deviceId: number;
  groupId: string;
}
