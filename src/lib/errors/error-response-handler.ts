import type { Response } from "express";
import { httpStatusCode } from "src/lib/constant";
import { AppError } from "src/lib/errors/app-errors";

export interface ParsedError {
  code: number;
  message: string;
}

export const errorResponseHandler = (message: string, code: number = httpStatusCode.INTERNAL_SERVER_ERROR): never => {
  throw new AppError(message, code);
};

export const errorParser = (error: unknown): ParsedError => {
  if (error instanceof AppError) {
    return { code: error.code, message: error.message };
  }

  console.error("error: ", error);

  return {
    code: httpStatusCode.INTERNAL_SERVER_ERROR,
    message: error instanceof Error ? error.message : String(error),
  };
};

export const formatErrorResponse = (res: Response, error: unknown) => {
  const { code, message } = errorParser(error);
  return res
    .status(code || httpStatusCode.INTERNAL_SERVER_ERROR)
    .json({
      success: false,
      message: message || "An error occurred",
      timestamp: new Date().toISOString()
    });
};
