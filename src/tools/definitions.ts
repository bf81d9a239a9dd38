import { z } from "zod";
import { ToolArgumentError } from "../infra/errors.js";
import type { ToolArguments } from "../agent/types.js";
import type { ServicesClient } from "./services-client.js";
import type { SessionContext } from "./session-context.js";
import { formatSessionContext } from "./session-context.js";
import type { ToolDefinition } from "./types.js";
import { formatDecimal } from "../utils.js";

function parseArgs<S extends z.ZodTypeAny>(toolName: string, schema: S, args: ToolArguments): z.infer<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ToolArgumentError(toolName, detail);
  }
  return parsed.data;
}

const nonEmpty = z.string().trim().min(1);

const WeatherArgs = z.object({ location: nonEmpty });
const ConvertArgs = z.object({
  from_currency: nonEmpty,
  to_currency: nonEmpty,
  amount: z.coerce.number().finite(),
});
const MemberArgs = z.object({ email: nonEmpty });
const FlightSearchArgs = z.object({ origin: nonEmpty, destination: nonEmpty, date: nonEmpty });
const BookFlightArgs = z.object({ flight_id: nonEmpty, member_id: nonEmpty });
const MovieSearchArgs = z.object({ genre: nonEmpty });
const BookMovieArgs = z.object({ movie_id: nonEmpty, seats: z.coerce.number().int().positive() });

function stringParam(description: string): Record<string, unknown> {
  return { type: "string", description };
}

export function createWeatherTool(services: ServicesClient): ToolDefinition {
  return {
    name: "get_weather",
    description:
      "Get the current weather for a city or location. Returns temperature, humidity, wind speed, and sky condition.",
    parameterSchema: {
      type: "object",
      properties: {
        location: stringParam('The city or location name (e.g. "London", "New York", "Mumbai").'),
      },
      required: ["location"],
    },
    execute: async (args) => {
      const { location } = parseArgs("get_weather", WeatherArgs, args);
      const data = await services.getWeather(location);
      return [
        `Weather in ${data.location}:`,
        `  Temperature: ${formatDecimal(data.temperature_c)}°C`,
        `  Condition: ${data.condition}`,
        `  Humidity: ${data.humidity}%`,
        `  Wind: ${formatDecimal(data.wind_kph)} km/h`,
      ].join("\n");
    },
  };
}

export function createCurrencyTool(services: ServicesClient): ToolDefinition {
  return {
    name: "convert_currency",
    description:
      "Convert an amount from one currency to another. Supported currencies: USD, EUR, GBP, INR, JPY. Returns the converted amount with the exchange rate used.",
    parameterSchema: {
      type: "object",
      properties: {
        from_currency: stringParam('The source currency code (e.g. "USD").'),
        to_currency: stringParam('The target currency code (e.g. "EUR").'),
        amount: { type: "number", description: "The amount to convert." },
      },
      required: ["from_currency", "to_currency", "amount"],
    },
    execute: async (args) => {
      const { from_currency, to_currency, amount } = parseArgs("convert_currency", ConvertArgs, args);
      const data = await services.convertCurrency(from_currency, to_currency, amount);
      if (data.rate === 0) {
        return `Currency pair ${from_currency}->${to_currency} is not supported.`;
      }
      return `${formatDecimal(data.amount)} ${data.from_currency} = ${formatDecimal(data.converted)} ${data.to_currency} (rate: ${formatDecimal(data.rate)})`;
    },
  };
}

export function createMemberLookupTool(services: ServicesClient): ToolDefinition {
  return {
    name: "member_lookup",
    description:
      "Look up a loyalty program member by their email address. Returns the member's name, ID, tier (Gold/Silver/Platinum) and reward points. The member_id from this result should be used in subsequent booking calls.",
    parameterSchema: {
      type: "object",
      properties: {
        email: stringParam('The member\'s email address (e.g. "test@email.com").'),
      },
      required: ["email"],
    },
    execute: async (args, session) => {
      const { email } = parseArgs("member_lookup", MemberArgs, args);
      const data = await services.lookupMember(email);
      if (data.member_id !== "N/A") {
        session.set("member_id", data.member_id);
        session.set("member_name", data.name);
        session.set("member_tier", data.tier);
      }
      return [
        "Member Profile:",
        `  Name: ${data.name}`,
        `  Email: ${data.email}`,
        `  Member ID: ${data.member_id}`,
        `  Tier: ${data.tier}`,
        `  Points: ${data.points}`,
      ].join("\n");
    },
  };
}

export function createFlightSearchTool(services: ServicesClient): ToolDefinition {
  return {
    name: "flight_search",
    description:
      "Search for available flights between two cities on a specific date. Returns flight IDs, airlines, times, and prices. Use the flight_id from these results to book via the book_flight tool.",
    parameterSchema: {
      type: "object",
      properties: {
        origin: stringParam('Departure city or airport code (e.g. "New York" or "JFK").'),
        destination: stringParam('Arrival city or airport code (e.g. "London" or "LHR").'),
        date: stringParam('Travel date in YYYY-MM-DD format (e.g. "2025-07-15").'),
      },
      required: ["origin", "destination", "date"],
    },
    execute: async (args) => {
      const { origin, destination, date } = parseArgs("flight_search", FlightSearchArgs, args);
      const data = await services.searchFlights(origin, destination, date);
      const lines = [`Flights from ${data.origin} to ${data.destination} on ${data.date}:\n`];
      for (const f of data.flights) {
        lines.push(
          `  [${f.flight_id}] ${f.airline} | Depart: ${f.departure} → Arrive: ${f.arrival} | $${formatDecimal(f.price_usd)}`,
        );
      }
      return lines.join("\n");
    },
  };
}

export function createBookFlightTool(services: ServicesClient): ToolDefinition {
  return {
    name: "book_flight",
    description:
      "Book a specific flight for a loyalty program member. Returns a booking confirmation with a confirmation code and status.",
    parameterSchema: {
      type: "object",
      properties: {
        flight_id: stringParam('The flight ID from a previous flight_search result (e.g. "FL-1234").'),
        member_id: stringParam('The member\'s ID from a previous member_lookup result (e.g. "MEM-1001").'),
      },
      required: ["flight_id", "member_id"],
    },
    execute: async (args) => {
      const { flight_id, member_id } = parseArgs("book_flight", BookFlightArgs, args);
      const data = await services.bookFlight(flight_id, member_id);
      return [
        "Booking Confirmed!",
        `  Confirmation Code: ${data.confirmation_code}`,
        `  Flight: ${data.flight_id}`,
        `  Member: ${data.member_id}`,
        `  Status: ${data.status}`,
      ].join("\n");
    },
  };
}

export function createMovieSearchTool(services: ServicesClient): ToolDefinition {
  return {
    name: "movie_search",
    description:
      "Search for currently playing movies by genre. Available genres: sci-fi, action, comedy, drama. Use the movie_id from these results to book via the book_movie tool.",
    parameterSchema: {
      type: "object",
      properties: {
        genre: stringParam('The movie genre to search for (e.g. "sci-fi", "action", "comedy", "drama").'),
      },
      required: ["genre"],
    },
    execute: async (args) => {
      const { genre } = parseArgs("movie_search", MovieSearchArgs, args);
      const data = await services.searchMovies(genre);
      if (data.movies.length === 0) {
        return `No movies found for genre: ${genre}. Try: sci-fi, action, comedy, drama.`;
      }
      const lines = [`Movies playing (${data.genre}):\n`];
      for (const m of data.movies) {
        lines.push(`  [${m.movie_id}] ${m.title} | Rating: ${formatDecimal(m.rating)}/10 | Showtime: ${m.showtime}`);
      }
      return lines.join("\n");
    },
  };
}

export function createBookMovieTool(services: ServicesClient): ToolDefinition {
  return {
    name: "book_movie",
    description:
      "Book movie tickets for a specific movie. Returns a digital ticket stub with ticket ID, seat count, total price, and status.",
    parameterSchema: {
      type: "object",
      properties: {
        movie_id: stringParam('The movie ID from a previous movie_search result (e.g. "MOV-301").'),
        seats: { type: "integer", description: "Number of seats/tickets to book (e.g. 2)." },
      },
      required: ["movie_id", "seats"],
    },
    execute: async (args) => {
      const { movie_id, seats } = parseArgs("book_movie", BookMovieArgs, args);
      const data = await services.bookMovie(movie_id, seats);
      return [
        "Movie Tickets Booked!",
        `  Ticket ID: ${data.ticket_id}`,
        `  Movie: ${data.movie_id}`,
        `  Seats: ${data.seats}`,
        `  Total: $${formatDecimal(data.total_price_usd)}`,
        `  Status: ${data.status}`,
      ].join("\n");
    },
  };
}

export function createSessionContextTool(): ToolDefinition {
  return {
    name: "get_session_context",
    description:
      "Retrieve the current session context (previously looked-up member info, etc.) stored by earlier tool calls in this session.",
    parameterSchema: { type: "object", properties: {} },
    execute: async (_args, session: SessionContext) => formatSessionContext(session),
  };
}

/** The full tool set, in the order it is advertised to the model. */
export function createDefaultTools(services: ServicesClient): ToolDefinition[] {
  return [
    createWeatherTool(services),
    createCurrencyTool(services),
    createMemberLookupTool(services),
    createFlightSearchTool(services),
    createBookFlightTool(services),
    createMovieSearchTool(services),
    createBookMovieTool(services),
    createSessionContextTool(),
  ];
}
