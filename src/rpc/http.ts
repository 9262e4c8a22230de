import { z } from "zod";
import { Provider, UpstreamError } from "./errors.js";

export type FetchFn = typeof fetch;

export interface RequestTarget {
  provider: Provider;
  operation: string;
}

const readJson = async (target: RequestTarget, response: Response): Promise<unknown> => {
  if (!response.ok) {
    throw new UpstreamError(target.provider, target.operation, `HTTP ${response.status}`, { status: response.status });
  }
  try {
    return await response.json();
  } catch (error) {
    throw new UpstreamError(target.provider, target.operation, "response is not JSON", { cause: error });
  }
};

export const parsePayload = <T extends z.ZodTypeAny>(target: RequestTarget, schema: T, body: unknown): z.infer<T> => {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "invalid payload";
    throw new UpstreamError(target.provider, target.operation, `unexpected payload (${where})`, { cause: parsed.error });
  }
  return parsed.data;
};

export const requestJson = async <T extends z.ZodTypeAny>(
  fetchFn: FetchFn,
  target: RequestTarget,
  schema: T,
  url: string,
  init: RequestInit = {}
): Promise<z.infer<T>> => {
  let response: Response;
  try {
    response = await fetchFn(url, init);
  } catch (error) {
    throw new UpstreamError(target.provider, target.operation, "request failed", { cause: error });
  }
  return parsePayload(target, schema, await readJson(target, response));
};
