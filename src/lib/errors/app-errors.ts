import mongoose from "mongoose";
import { httpStatusCode } from "src/lib/constant";

export class AppError extends Error {
  readonly code: number;

  constructor(message: string, code: number = httpStatusCode.INTERNAL_SERVER_ERROR, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The referenced link does not exist. Permanent: retrying without a different link id fails again. */
export class IntegrityError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, httpStatusCode.NOT_FOUND, options);
  }
}

/** Storage could not be reached or did not answer in time. Safe to retry with backoff. */
export class UnavailableError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, httpStatusCode.SERVICE_UNAVAILABLE, options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, httpStatusCode.BAD_REQUEST, options);
  }
}

const { mongo } = mongoose;

// The driver raises subclasses of these (pool cleared, network timeout, ...)
const UNAVAILABLE_ERROR_TYPES = [
  mongo.MongoNetworkError,
  mongo.MongoServerSelectionError,
  mongo.MongoNotConnectedError,
  mongo.MongoTopologyClosedError,
  mongo.MongoOperationTimeoutError,
];

// mongoose wraps the driver's selection failure in its own class
const MONGOOSE_SERVER_SELECTION_ERROR = "MongooseServerSelectionError";

// MaxTimeMSExpired and ExceededTimeLimit: an operation ran past its time limit
const TIME_LIMIT_CODES = new Set([50, 262]);

export const isUnavailableError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  if (UNAVAILABLE_ERROR_TYPES.some((type) => error instanceof type)) return true;
  if (error.name === MONGOOSE_SERVER_SELECTION_ERROR) return true;
  if ("code" in error && typeof error.code === "number" && TIME_LIMIT_CODES.has(error.code)) return true;
  return /buffering timed out/i.test(error.message);
};

/**
 * Maps a storage failure onto the error taxonomy. Application errors and
 * anything that is not an availability problem come back unchanged.
 */
export const toStoreError = (error: unknown): unknown => {
  if (error instanceof AppError) return error;
  if (isUnavailableError(error)) {
    const reason = error instanceof Error ? error.message : String(error);
    return new UnavailableError(`Storage unavailable: ${reason}`, { cause: error });
  }
  return error;
};
