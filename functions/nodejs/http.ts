// Shared bits for the API Gateway (proxy integration) Lambda handlers.

export interface ApiEvent {
  queryStringParameters?: Record<string, string | undefined> | null;
}

export interface LambdaContext {
  awsRequestId?: string;
  functionName?: string;
  functionVersion?: string;
}

export interface ApiResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export function json(statusCode: number, payload: unknown): ApiResponse {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Access-Control-Allow-Headers": "Content-Type",
      "Access-Control-Allow-Methods": "GET",
    },
    body: JSON.stringify(payload),
  };
}

/** Trimmed `query` and optional `symbols` query-string parameters. */
export function readBriefParams(
  event: ApiEvent
): { query: string; symbols: string | undefined } {
  const qs = event.queryStringParameters ?? {};
  const query = String(qs.query ?? "").trim();
  const symbols = qs.symbols?.trim() || undefined;
  return { query, symbols };
}
