import type { z } from "zod";
import { fetchJson, withQuery } from "../infra/http.js";
import {
  BookingConfirmationSchema,
  CurrencyResponseSchema,
  FlightSearchResponseSchema,
  MemberResponseSchema,
  MovieSearchResponseSchema,
  MovieTicketSchema,
  WeatherResponseSchema,
} from "../services/schemas.js";
import type {
  BookingConfirmation,
  CurrencyResponse,
  FlightSearchResponse,
  MemberResponse,
  MovieSearchResponse,
  MovieTicket,
  WeatherResponse,
} from "../services/schemas.js";

export type ServicesClient = {
  getWeather: (location: string) => Promise<WeatherResponse>;
  convertCurrency: (from: string, to: string, amount: number) => Promise<CurrencyResponse>;
  lookupMember: (email: string) => Promise<MemberResponse>;
  searchFlights: (origin: string, destination: string, date: string) => Promise<FlightSearchResponse>;
  bookFlight: (flightId: string, memberId: string) => Promise<BookingConfirmation>;
  searchMovies: (genre: string) => Promise<MovieSearchResponse>;
  bookMovie: (movieId: string, seats: number) => Promise<MovieTicket>;
};

export type ServicesClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
};

/** Typed client for the mock data services. Responses are schema-checked. */
export function createServicesClient(options: ServicesClientOptions): ServicesClient {
  const baseUrl = options.baseUrl.replace(/\/+$/, "");

  async function request<S extends z.ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    query: Record<string, string | number>,
    schema: S,
  ): Promise<z.infer<S>> {
    const body = await fetchJson(withQuery(baseUrl, path, query), {
      method,
      timeoutMs: options.timeoutMs,
    });
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return parsed.data;
  }

  return {
    getWeather: (location) => request("GET", "/weather", { location }, WeatherResponseSchema),
    convertCurrency: (from, to, amount) =>
      request("GET", "/convert", { from_currency: from, to_currency: to, amount }, CurrencyResponseSchema),
    lookupMember: (email) => request("GET", "/member", { email }, MemberResponseSchema),
    searchFlights: (origin, destination, date) =>
      request("GET", "/flights", { origin, destination, date }, FlightSearchResponseSchema),
    bookFlight: (flightId, memberId) =>
      request("POST", "/book_flight", { flight_id: flightId, member_id: memberId }, BookingConfirmationSchema),
    searchMovies: (genre) => request("GET", "/movies", { genre }, MovieSearchResponseSchema),
    bookMovie: (movieId, seats) =>
      request("POST", "/book_movie", { movie_id: movieId, seats }, MovieTicketSchema),
  };
}
