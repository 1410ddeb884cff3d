import { ValidationError } from '../errors/travel-agent.errors';

/** Body of `POST /travelAgent`, e.g. `{"userQuery": "Book a flight from NYC to LAX"}`. */
export interface TravelAgentRequestDto {
  userQuery: string;
}

export type TravelQuery = TravelAgentRequestDto;

export interface TravelAgentResponseDto {
  result: string;
}

/**
 * Any string is a valid query, the empty one included. City names inside it
 * are left to the model.
 */
export function parseTravelAgentRequest(body: unknown): TravelQuery {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Invalid JSON: request body must be a JSON object');
  }
  if (!('userQuery' in body) || typeof body.userQuery !== 'string') {
    throw new ValidationError('Invalid JSON: "userQuery" is required and must be a string');
  }
  return { userQuery: body.userQuery };
}
