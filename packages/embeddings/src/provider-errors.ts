import { mapExternalError, type AppError } from "@sitedocs/errors";

export function mapProviderError(error: unknown, service: string): AppError {
  return mapExternalError(error, service, "embedding request");
}
