import { Hono } from "hono";
import type { Context } from "hono";
import { createLogger } from "../logging.js";
import { AIRLINES, CONDITIONS, EXCHANGE_RATES, MEMBERS, MOVIES } from "./data.js";
import { randomChoice, randomCode, randomInt, randomUniform, round } from "./random.js";
import type { RandomSource } from "./random.js";
import type {
  BookingConfirmation,
  CurrencyResponse,
  Flight,
  FlightSearchResponse,
  MemberResponse,
  MovieSearchResponse,
  MovieTicket,
  WeatherResponse,
} from "./schemas.js";

const log = createLogger("services");

const MINUTES = ["00", "15", "30", "45"] as const;

export type ServicesAppOptions = {
  random?: RandomSource;
};

class MissingParamError extends Error {
  constructor(readonly param: string, readonly expected: string) {
    super(`Query parameter '${param}' is required and must be ${expected}`);
  }
}

function requireString(c: Context, name: string): string {
  const value = c.req.query(name)?.trim();
  if (!value) {
    throw new MissingParamError(name, "a non-empty string");
  }
  return value;
}

function requireNumber(c: Context, name: string, integer = false): number {
  const raw = c.req.query(name)?.trim();
  const value = raw ? Number(raw) : Number.NaN;
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new MissingParamError(name, integer ? "an integer" : "a number");
  }
  return value;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Mock REST endpoints for weather, currency, members, flights and movies. */
export function createServicesApp(options?: ServicesAppOptions): Hono {
  const random = options?.random ?? Math.random;
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof MissingParamError) {
      return c.json({ error: err.message }, 422);
    }
    log.error(`Unhandled error on ${c.req.path}: ${err.message}`);
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/weather", (c) => {
    const location = requireString(c, "location");
    const body: WeatherResponse = {
      location,
      temperature_c: round(randomUniform(random, -5, 42), 1),
      condition: randomChoice(random, CONDITIONS),
      humidity: randomInt(random, 20, 95),
      wind_kph: round(randomUniform(random, 0, 60), 1),
    };
    return c.json(body);
  });

  app.get("/convert", (c) => {
    const from = requireString(c, "from_currency").toUpperCase();
    const to = requireString(c, "to_currency").toUpperCase();
    const amount = requireNumber(c, "amount");
    const rate = EXCHANGE_RATES[`${from}:${to}`];
    const body: CurrencyResponse = rate === undefined
      ? { from_currency: from, to_currency: to, amount, converted: 0, rate: 0 }
      : { from_currency: from, to_currency: to, amount, converted: round(amount * rate, 2), rate };
    return c.json(body);
  });

  app.get("/member", (c) => {
    const email = requireString(c, "email");
    const member = MEMBERS[email.toLowerCase()];
    const body: MemberResponse = member
      ? { email, ...member }
      : { email, name: "Unknown", member_id: "N/A", tier: "None", points: 0 };
    return c.json(body);
  });

  app.get("/flights", (c) => {
    const origin = requireString(c, "origin").toUpperCase();
    const destination = requireString(c, "destination").toUpperCase();
    const date = requireString(c, "date");
    const count = randomInt(random, 2, 3);
    const flights: Flight[] = [];
    for (let i = 0; i < count; i++) {
      const depHour = randomInt(random, 6, 20);
      flights.push({
        flight_id: `FL-${randomInt(random, 1000, 9999)}`,
        airline: randomChoice(random, AIRLINES),
        origin,
        destination,
        date,
        departure: `${pad2(depHour)}:${randomChoice(random, MINUTES)}`,
        arrival: `${pad2((depHour + randomInt(random, 2, 8)) % 24)}:${randomChoice(random, MINUTES)}`,
        price_usd: round(randomUniform(random, 150, 1200), 2),
      });
    }
    const body: FlightSearchResponse = { origin, destination, date, flights };
    return c.json(body);
  });

  app.post("/book_flight", (c) => {
    const flightId = requireString(c, "flight_id");
    const memberId = requireString(c, "member_id");
    const body: BookingConfirmation = {
      confirmation_code: randomCode(random, "CONF"),
      flight_id: flightId,
      member_id: memberId,
      status: "confirmed",
    };
    return c.json(body);
  });

  app.get("/movies", (c) => {
    const genre = requireString(c, "genre").toLowerCase();
    const body: MovieSearchResponse = {
      genre,
      movies: (MOVIES[genre] ?? []).map((m) => ({ ...m, genre })),
    };
    return c.json(body);
  });

  app.post("/book_movie", (c) => {
    const movieId = requireString(c, "movie_id");
    const seats = requireNumber(c, "seats", true);
    const body: MovieTicket = {
      ticket_id: randomCode(random, "TKT"),
      movie_id: movieId,
      seats,
      total_price_usd: round(seats * randomUniform(random, 10, 18), 2),
      status: "confirmed",
    };
    return c.json(body);
  });

  return app;
}
