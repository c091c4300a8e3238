/** Non-2xx response from the LinkedIn API. `statusCode` drives retry decisions. */
export class LinkedInApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public body?: string,
  ) {
    super(message);
    this.name = 'LinkedInApiError';
  }
}

/** Media rejected before any request is made (type or size outside the platform limits) */
export class MediaValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MediaValidationError';
  }
}
