import { z } from "zod";

export const WeatherResponseSchema = z.object({
  location: z.string(),
  temperature_c: z.number(),
  condition: z.string(),
  humidity: z.number().int(),
  wind_kph: z.number(),
});

export type WeatherResponse = z.infer<typeof WeatherResponseSchema>;

export const CurrencyResponseSchema = z.object({
  from_currency: z.string(),
  to_currency: z.string(),
  amount: z.number(),
  converted: z.number(),
  rate: z.number(),
});

export type CurrencyResponse = z.infer<typeof CurrencyResponseSchema>;

export const MemberResponseSchema = z.object({
  email: z.string(),
  name: z.string(),
  member_id: z.string(),
  tier: z.string(),
  points: z.number().int(),
});

export type MemberResponse = z.infer<typeof MemberResponseSchema>;

export const FlightSchema = z.object({
  flight_id: z.string(),
  airline: z.string(),
  origin: z.string(),
  destination: z.string(),
  date: z.string(),
  departure: z.string(),
  arrival: z.string(),
  price_usd: z.number(),
});

export type Flight = z.infer<typeof FlightSchema>;

export const FlightSearchResponseSchema = z.object({
  origin: z.string(),
  destination: z.string(),
  date: z.string(),
  flights: z.array(FlightSchema),
});

export type FlightSearchResponse = z.infer<typeof FlightSearchResponseSchema>;

export const BookingConfirmationSchema = z.object({
  confirmation_code: z.string(),
  flight_id: z.string(),
  member_id: z.string(),
  status: z.string(),
});

export type BookingConfirmation = z.infer<typeof BookingConfirmationSchema>;

export const MovieSchema = z.object({
  movie_id: z.string(),
  title: z.string(),
  genre: z.string(),
  rating: z.number(),
  showtime: z.string(),
});

export type Movie = z.infer<typeof MovieSchema>;

export const MovieSearchResponseSchema = z.object({
  genre: z.string(),
  movies: z.array(MovieSchema),
});

export type MovieSearchResponse = z.infer<typeof MovieSearchResponseSchema>;

export const MovieTicketSchema = z.object({
  ticket_id: z.string(),
  movie_id: z.string(),
  seats: z.number().int(),
  total_price_usd: z.number(),
  status: z.string(),
});

export type MovieTicket = z.infer<typeof MovieTicketSchema>;
