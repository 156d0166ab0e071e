export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing, ambiguous or undecodable image input. */
export class InvalidImageError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** The model or the centroid table needed by a request never loaded. */
export class ServiceUnavailableError extends HttpError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class PayloadTooLargeError extends HttpError {
  constructor(message: string) {
    super(message, 413);
  }
}
