import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { ServiceError as ChatError } from "../services/chatService";
import type { ServiceError as PushError } from "../services/pushService";

export type HttpError =
  | ChatError
  | PushError
  | Readonly<{ code: "INVALID_SESSION" | "NOT_FOUND" | "INTERNAL_ERROR"; message: string; context?: Record<string, unknown> }>;

export function statusForCode(code: HttpError["code"]): number {
  return code === "INVALID_SESSION"
    ? 401
    : code === "UNAUTHORIZED_ACTION"
      ? 403
    : code === "CHAT_NOT_FOUND"
      ? 404
    : code === "MESSAGE_NOT_FOUND"
      ? 404
    : code === "TOKEN_NOT_FOUND"
      ? 404
    : code === "NOT_FOUND"
      ? 404
    : code === "CHAT_ALREADY_EXISTS"
      ? 409
    : code === "DIRECT_CHAT_IMMUTABLE"
      ? 409
    : code === "STORE_UNAVAILABLE"
      ? 503
    : code === "INTERNAL_ERROR"
      ? 500
      : 400;
}

export function sendError(res: Response, error: HttpError): void {
  res.status(statusForCode(error.code)).json(error);
}

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Forwards rejections to the error boundary instead of leaving them unhandled.
export function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    void handler(req, res).catch(next);
  };
}
