import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { describeError } from "./errors";

const RemoteErrorBodySchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  productId: z.number().optional(),
});

export type RemoteErrorBody = z.infer<typeof RemoteErrorBodySchema>;

export interface RemoteFailure {
  /** HTTP status, when the collaborator answered at all. */
  status?: number;
  body?: RemoteErrorBody;
  reason: string;
}

export function toRemoteFailure(error: unknown): RemoteFailure {
  if (!axios.isAxiosError(error)) {
    return { reason: describeError(error) };
  }

  if (error.response) {
    const parsed = RemoteErrorBodySchema.safeParse(error.response.data);
    const body = parsed.success ? parsed.data : undefined;
    return {
      status: error.response.status,
      body,
      reason: body?.message ?? `HTTP ${error.response.status}`,
    };
  }

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return { reason: `timed out (${error.message})` };
  }

  return { reason: error.message };
}

export const createHttpClient = (
  baseURL: string,
  timeoutMs: number
): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: { "Content-Type": "application/json" },
  });
