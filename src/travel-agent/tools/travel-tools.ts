/**
 * Mock travel tools. They return canned answers; real inventory lookups
 * (Amadeus, Expedia, ...) would replace the bodies of the two functions.
 */
import { Logger } from '@nestjs/common';
import { createToolRegistry, defineTool, requireString } from './tool.types';

const logger = new Logger('TravelTools');

const FLIGHT_PRICE = '$550';

const HOTELS_BY_CITY: Readonly<Record<string, string>> = {
  london: 'The Savoy is a highly-rated luxury hotel with excellent reviews.',
  tokyo: 'The Park Hyatt is a great choice with stunning city views.',
};

export interface SearchFlightsInput {
  departure: string;
  arrival: string;
}

export interface SuggestHotelInput {
  destination: string;
}

export function searchFlights(input: SearchFlightsInput): string {
  const { departure, arrival } = input;
  logger.log(`Tool called: searchFlights from ${departure} to ${arrival}`);
  return `Found flights from ${departure} to ${arrival}. A non-stop flight is available for ${FLIGHT_PRICE}.`;
}

export function suggestHotel(input: SuggestHotelInput): string {
  const { destination } = input;
  logger.log(`Tool called: suggestHotel in ${destination}`);
  const key = destination.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(HOTELS_BY_CITY, key)) {
    return HOTELS_BY_CITY[key];
  }
  return `I'm sorry, I don't have a specific hotel recommendation for ${destination}.`;
}

export const searchFlightsTool = defineTool<SearchFlightsInput>({
  name: 'searchFlights',
  description: 'Searches for flights between a departure and arrival city.',
  input: {
    departure: 'Departure city',
    arrival: 'Arrival city',
  },
  parseInput: (args) => ({
    departure: requireString(args, 'departure'),
    arrival: requireString(args, 'arrival'),
  }),
  run: searchFlights,
});

export const suggestHotelTool = defineTool<SuggestHotelInput>({
  name: 'suggestHotel',
  description: 'Suggests a popular and well-rated hotel in a given destination.',
  input: {
    destination: 'Destination city',
  },
  parseInput: (args) => ({ destination: requireString(args, 'destination') }),
  run: suggestHotel,
});

export const TRAVEL_AGENT_TOOLS = createToolRegistry([searchFlightsTool, suggestHotelTool]);
