/** Invalid configuration: bad capacities, duplicate names or routes. Fatal at startup. */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";
}

/** An inbound payload the handler cannot turn into a Message */
export class ParseError extends Error {
  override readonly name = "ParseError";

  constructor(
    message: string,
    readonly platform: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export type ModelErrorKind = "timeout" | "rejected" | "malformed" | "cancelled";

/** A model backend call that produced no usable reply */
export class ModelError extends Error {
  override readonly name = "ModelError";

  constructor(
    readonly kind: ModelErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }

  /** Normalize anything a plugin rejects with into a ModelError */
  static from(err: unknown): ModelError {
    if (err instanceof ModelError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ModelError("rejected", message, { cause: err });
  }
}

/** I/O failure in a persistent ChatStore. The in-memory store never raises it. */
export class StoreError extends Error {
  override readonly name = "StoreError";
}

export type PipelineErrorCode =
  | "INVALID_PAYLOAD"
  | "MODEL_UNAVAILABLE"
  | "CANCELLED"
  | "STORE_UNAVAILABLE";

export type PipelineError = Readonly<{
  code: PipelineErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: PipelineError };
export type PipelineResult<T> = ResultOk<T> | ResultErr;

export const ok = <T>(value: T): ResultOk<T> => ({ ok: true, value });

export const fail = (
  code: PipelineErrorCode,
  message: string,
  context?: Record<string, unknown>,
): ResultErr => ({
  ok: false,
  error: context ? { code, message, context } : { code, message },
});
