const enum Http {
  OK = 200,
  PartialContent = 206,
  RequestTimeout = 408,
  TooManyRequests = 429,
  InternalServerError = 500,
  BadGateway = 502,
  ServiceUnavailable = 503,
  GatewayTimeout = 504,
  WebServerIsDown = 521,
  ConnectionTimedOut = 522,
  ATimeoutOccurred = 524,
}

// The server answers range requests with either status
export const successCodes: readonly number[] = [Http.OK, Http.PartialContent];

export const retryCodes: readonly number[] = [
  Http.RequestTimeout,
  Http.TooManyRequests,
  Http.InternalServerError,
  Http.BadGateway,
  Http.ServiceUnavailable,
  Http.GatewayTimeout,
  Http.WebServerIsDown,
  Http.ConnectionTimedOut,
  Http.ATimeoutOccurred,
];
