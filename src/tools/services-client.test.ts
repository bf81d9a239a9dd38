import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createServicesClient } from "./services-client.js";
import { createServicesApp } from "../services/app.js";

const BASE_URL = "http://services.test";

describe("createServicesClient", () => {
  const app = createServicesApp({ random: () => 0 });
  const requests: string[] = [];

  beforeEach(() => {
    requests.length = 0;
    vi.stubGlobal("fetch", (input: string | URL | Request, init?: RequestInit) => {
      requests.push(`${init?.method ?? "GET"} ${String(input)}`);
      return app.request(input, init);
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches the weather", async () => {
    const client = createServicesClient({ baseUrl: `${BASE_URL}/` });
    await expect(client.getWeather("New York")).resolves.toEqual({
      location: "New York",
      temperature_c: -5,
      condition: "Sunny",
      humidity: 20,
      wind_kph: 0,
    });
    expect(requests).toEqual(["GET http://services.test/weather?location=New+York"]);
  });

  it("converts currency", async () => {
    const client = createServicesClient({ baseUrl: BASE_URL });
    await expect(client.convertCurrency("GBP", "USD", 10)).resolves.toEqual({
      from_currency: "GBP",
      to_currency: "USD",
      amount: 10,
      converted: 12.7,
      rate: 1.27,
    });
  });

  it("looks up a member", async () => {
    const client = createServicesClient({ baseUrl: BASE_URL });
    await expect(client.lookupMember("sara@demo.com")).resolves.toMatchObject({
      member_id: "MEM-1003",
      tier: "Platinum",
    });
  });

  it("posts bookings with query parameters", async () => {
    const client = createServicesClient({ baseUrl: BASE_URL });

    await expect(client.bookFlight("FL-1000", "MEM-1001")).resolves.toEqual({
      confirmation_code: "CONF-AAAAAA",
      flight_id: "FL-1000",
      member_id: "MEM-1001",
      status: "confirmed",
    });
    await expect(client.bookMovie("MOV-502", 3)).resolves.toMatchObject({ seats: 3, total_price_usd: 30 });
    expect(requests).toEqual([
      "POST http://services.test/book_flight?flight_id=FL-1000&member_id=MEM-1001",
      "POST http://services.test/book_movie?movie_id=MOV-502&seats=3",
    ]);
  });

  it("searches flights and movies", async () => {
    const client = createServicesClient({ baseUrl: BASE_URL });

    const flights = await client.searchFlights("SFO", "NRT", "2026-12-01");
    expect(flights.flights.map((f) => f.flight_id)).toEqual(["FL-1000", "FL-1000"]);

    const movies = await client.searchMovies("comedy");
    expect(movies.movies.map((m) => m.title)).toEqual(["Office Chaos", "The Unlikely Pair"]);
  });

  it("rejects a response of the wrong shape", async () => {
    vi.stubGlobal("fetch", async () => new Response(JSON.stringify({ location: "X" }), { status: 200 }));
    const client = createServicesClient({ baseUrl: BASE_URL });

    await expect(client.getWeather("X")).rejects.toThrow(/^Unexpected response from \/weather: /);
  });

  it("rejects a non-2xx response", async () => {
    const client = createServicesClient({ baseUrl: BASE_URL });

    await expect(client.getWeather("")).rejects.toThrow(
      `HTTP 422: {"error":"Query parameter 'location' is required and must be a non-empty string"}`,
    );
  });
});
