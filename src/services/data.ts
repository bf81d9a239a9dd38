export const EXCHANGE_RATES: Readonly<Record<string, number>> = {
  "USD:EUR": 0.92,
  "EUR:USD": 1.09,
  "USD:GBP": 0.79,
  "GBP:USD": 1.27,
  "USD:INR": 83.5,
  "INR:USD": 0.012,
  "EUR:GBP": 0.86,
  "GBP:EUR": 1.16,
  "USD:JPY": 154.5,
  "JPY:USD": 0.0065,
  "EUR:INR": 90.8,
  "INR:EUR": 0.011,
};

export type MemberRecord = {
  name: string;
  member_id: string;
  tier: "Gold" | "Silver" | "Platinum";
  points: number;
};

export const MEMBERS: Readonly<Record<string, MemberRecord>> = {
  "test@email.com": { name: "Alice Johnson", member_id: "MEM-1001", tier: "Gold", points: 52400 },
  "john@demo.com": { name: "John Smith", member_id: "MEM-1002", tier: "Silver", points: 18700 },
  "sara@demo.com": { name: "Sara Williams", member_id: "MEM-1003", tier: "Platinum", points: 105000 },
};

export const AIRLINES = ["SkyWay Airlines", "AeroConnect", "GlobalJet"] as const;

export const CONDITIONS = [
  "Sunny",
  "Partly Cloudy",
  "Cloudy",
  "Rainy",
  "Thunderstorm",
  "Snowy",
  "Windy",
  "Clear",
] as const;

export type MovieRecord = {
  movie_id: string;
  title: string;
  rating: number;
  showtime: string;
};

export const MOVIES: Readonly<Record<string, readonly MovieRecord[]>> = {
  "sci-fi": [
    { movie_id: "MOV-301", title: "Quantum Horizon", rating: 8.4, showtime: "7:00 PM" },
    { movie_id: "MOV-302", title: "Neural Frontier", rating: 7.9, showtime: "9:30 PM" },
    { movie_id: "MOV-303", title: "The Singularity Code", rating: 8.1, showtime: "6:15 PM" },
  ],
  action: [
    { movie_id: "MOV-401", title: "Steel Thunder", rating: 7.5, showtime: "8:00 PM" },
    { movie_id: "MOV-402", title: "Rogue Protocol", rating: 8.0, showtime: "9:00 PM" },
  ],
  comedy: [
    { movie_id: "MOV-501", title: "Office Chaos", rating: 7.2, showtime: "6:30 PM" },
    { movie_id: "MOV-502", title: "The Unlikely Pair", rating: 7.8, showtime: "8:45 PM" },
  ],
  drama: [
    { movie_id: "MOV-601", title: "The Last Letter", rating: 8.6, showtime: "7:30 PM" },
    { movie_id: "MOV-602", title: "Echoes of Tomorrow", rating: 8.2, showtime: "9:15 PM" },
  ],
};
