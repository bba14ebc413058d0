import type { APIGatewayProxyResult } from 'aws-lambda';

/**
 * Response helper functions for API Gateway responses
 */

const json = (
  statusCode: number,
  body: Record<string, unknown>,
  headers: Record<string, string> = {}
): APIGatewayProxyResult => ({
  statusCode,
  headers: { 'Content-Type': 'application/json', ...headers },
  body: JSON.stringify(body),
});

// Success response
export const success = (data?: unknown, headers?: Record<string, string>): APIGatewayProxyResult =>
  json(200, { success: true, ...(data !== undefined && { data }) }, headers);

// Error responses
export const badRequest = (message: string): APIGatewayProxyResult =>
  json(400, { success: false, error: message });

export const unauthorized = (message: string): APIGatewayProxyResult =>
  json(401, { success: false, error: message });

export const notFound = (message: string): APIGatewayProxyResult =>
  json(404, { success: false, error: message });

export const methodNotAllowed = (method: string): APIGatewayProxyResult =>
  json(405, { success: false, error: `Method ${method} not allowed` });

export const internalError = (message: string): APIGatewayProxyResult =>
  json(500, { success: false, error: message });

/**
 * Check if a resolver returned an error response instead of a value
 */
export function isErrorResponse(result: object): result is APIGatewayProxyResult {
  return 'statusCode' in result;
}
