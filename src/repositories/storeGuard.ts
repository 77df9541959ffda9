import mongoose, { isValidObjectId } from "mongoose";
import { StoreUnavailable } from "../common/errors";

// Driver errors that mean "could not talk to the server", not "bad request"
const UNAVAILABLE_ERROR_NAMES = new Set([
  "MongoServerSelectionError",
  "MongooseServerSelectionError",
  "MongoNetworkError",
  "MongoNetworkTimeoutError",
  "MongoTimeoutError",
  "MongoNotConnectedError",
  "MongoTopologyClosedError",
]);

const CONNECTED = 1;

export const isUnavailableError = (error: unknown): boolean =>
  error instanceof Error && UNAVAILABLE_ERROR_NAMES.has(error.name);

/**
 * Runs a document-store operation, turning connectivity failures into
 * StoreUnavailable. Every other error is rethrown untouched.
 */
export async function withStore<T>(store: string, operation: () => Promise<T>): Promise<T> {
  if (mongoose.connection.readyState !== CONNECTED) {
    throw new StoreUnavailable(store);
  }
  try {
    return await operation();
  } catch (error) {
    if (isUnavailableError(error)) {
      throw new StoreUnavailable(store, error);
    }
    throw error;
  }
}

export const isDocumentId = (id: string): boolean => isValidObjectId(id);

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === 11000;
