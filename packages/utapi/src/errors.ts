/**
 * Error types raised by the client and the upload helpers.
 */

/** Required configuration is missing. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The UploadThing API answered with a status outside 200-299. */
export class UploadThingError extends Error {
  public readonly status: number;
  public readonly body: string;
  public readonly path: string;

  constructor(status: number, body: string, path: string) {
    super(`UploadThing: error ${status}: ${body}`);
    this.name = 'UploadThingError';
    this.status = status;
    this.body = body;
    this.path = path;
  }
}

/** The presigned upload target answered with a status outside 200-299. */
export class PresignedUploadError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`File upload error: ${status}: ${body}`);
    this.name = 'PresignedUploadError';
    this.status = status;
    this.body = body;
  }
}
