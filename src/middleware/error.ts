import type { Request, Response, NextFunction } from "express";
import multer from "multer";
import { ZodError } from "zod";
import type { ErrorResponse } from "../types/contracts.js";
import { logger } from "../utils/logger.js";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code?: string;

  constructor(message: string, statusCode: number, code?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = true;
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  if (err instanceof ZodError) {
    logger.warn({
      msg: "Validation error",
      errors: err.errors,
    });

    return res.status(400).json({
      status: "error",
      error: "validation_error",
      message: "Invalid request data",
      details: err.errors.map((e) => ({
        path: e.path.join("."),
        message: e.message,
      })),
    });
  }

  if (err instanceof AppError) {
    logger.warn({
      msg: "Operational error",
      code: err.code,
      statusCode: err.statusCode,
      message: err.message,
    });

    return res.status(err.statusCode).json(errorBody(err.code ?? "error", err.message));
  }

  if (err instanceof multer.MulterError) {
    logger.warn({
      msg: "Upload rejected",
      code: err.code,
      field: err.field,
    });

    if (err.code === "LIMIT_FILE_SIZE") {
      return res.status(413).json(errorBody("upload_too_large", "Uploaded image is too large"));
    }
    return res.status(400).json(errorBody("invalid_upload", err.message));
  }

  // body-parser marks malformed JSON and oversized bodies with a 4xx status
  const status = "status" in err && typeof err.status === "number" ? err.status : undefined;
  if (status !== undefined && status >= 400 && status < 500) {
    logger.warn({
      msg: "Malformed request body",
      statusCode: status,
      message: err.message,
    });

    return res.status(status).json(errorBody("invalid_body", "Request body could not be parsed"));
  }

  logger.error({
    msg: "Internal server error",
    error: err.message,
    stack: err.stack,
  });

  res.status(500).json(errorBody("internal_error", "An unexpected error occurred"));
}

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(errorBody("not_found", "The requested resource was not found"));
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function errorBody(code: string, message: string): ErrorResponse {
  return { status: "error", error: code, message };
}
