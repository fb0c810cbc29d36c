import { z } from 'zod';
import type { ScheduleRecord } from '../types/flight.types';

const nullableString = z.string().nullable();

const airportSchema = z.object({
  iata: nullableString,
  icao: nullableString,
  name: nullableString,
});

const scheduleTimesSchema = z.object({
  scheduled: nullableString,
  estimated: nullableString,
  actual: nullableString,
  delayMinutes: z.number().nullable(),
});

/**
 * A schedule record as written to the on-disk schedule cache.
 */
export const scheduleRecordSchema: z.ZodType<ScheduleRecord> = z.object({
  flightNumber: nullableString,
  status: nullableString,
  airline: nullableString,
  aircraftType: nullableString,
  registration: nullableString,
  origin: airportSchema.nullable(),
  destination: airportSchema.nullable(),
  departure: scheduleTimesSchema.nullable(),
  arrival: scheduleTimesSchema.nullable(),
});
