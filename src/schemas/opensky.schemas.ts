import { z } from 'zod';

export const openSkyStatesSchema = z.object({
  time: z.number(),
  states: z.array(z.array(z.unknown())).nullable(),
});

export type OpenSkyStatesResponse = z.infer<typeof openSkyStatesSchema>;

export type StateVector = unknown[];
