export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string,
    name = 'HttpError',
  ) {
    super(message);
    this.name = name;
  }
}

export const notFound = (message: string): HttpError => new HttpError(404, message, 'NotFound');
