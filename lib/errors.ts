export class UnsupportedServiceTypeError extends Error {
  readonly serviceType: string;

  constructor(serviceType: string) {
    super(`Unsupported service type: ${serviceType}`);
    this.name = "UnsupportedServiceTypeError";
    this.serviceType = serviceType;
  }
}

export class InvalidRequestBodyError extends Error {
  constructor(message = "Request body must be valid JSON") {
    super(message);
    this.name = "InvalidRequestBodyError";
  }
}

/** Non-2xx answer from the provider. */
export class ProviderHttpError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(`Provider HTTP ${status}`);
    this.name = "ProviderHttpError";
    this.status = status;
    this.body = body;
  }
}

export class ProviderResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderResponseError";
  }
}

export class ProviderTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Provider request timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
