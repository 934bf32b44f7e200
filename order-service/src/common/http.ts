import {
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response,
} from "express";
import { z, ZodTypeAny } from "zod";
import { describeError, ServiceError, ValidationError } from "./errors";

export const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

export function parse<S extends ZodTypeAny>(
  schema: S,
  value: unknown
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const errors: Record<string, string> = {};
    for (const issue of result.error.issues) {
      errors[issue.path.join(".") || "value"] = issue.message;
    }
    throw new ValidationError(errors);
  }
  return result.data;
}

export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (error instanceof ServiceError) {
    res.status(error.status).json(error.toBody());
    return;
  }

  if (error instanceof SyntaxError) {
    res
      .status(400)
      .json({ error: "VALIDATION_FAILED", message: "Malformed JSON body" });
    return;
  }

  const message = describeError(error);
  console.error("[order-service] Unhandled error:", message);
  res.status(500).json({ error: "INTERNAL_ERROR", message });
};
