import { z } from 'zod';

const optionalString = z.string().nullish();

const airportInfoSchema = z.object({
  airport: optionalString,
  iata: optionalString,
  icao: optionalString,
  scheduled: optionalString,
  estimated: optionalString,
  actual: optionalString,
  delay: z.number().nullish(),
});

export const aviationStackFlightSchema = z.object({
  flight_status: optionalString,
  departure: airportInfoSchema.nullish(),
  arrival: airportInfoSchema.nullish(),
  airline: z.object({
    name: optionalString,
    iata: optionalString,
    icao: optionalString,
  }).nullish(),
  flight: z.object({
    number: optionalString,
    iata: optionalString,
    icao: optionalString,
  }).nullish(),
  aircraft: z.object({
    registration: optionalString,
    iata: optionalString,
    icao: optionalString,
  }).nullish(),
});

export const aviationStackErrorSchema = z.object({
  code: z.string(),
  message: z.string().nullish(),
});

export const aviationStackResponseSchema = z.object({
  data: z.array(aviationStackFlightSchema).nullish(),
  error: aviationStackErrorSchema.nullish(),
});

export type AviationStackFlight = z.infer<typeof aviationStackFlightSchema>;
export type AviationStackAirportInfo = z.infer<typeof airportInfoSchema>;
export type AviationStackResponse = z.infer<typeof aviationStackResponseSchema>;
