/** Error taxonomy shared by every package.
 * Registry and length errors surface to the caller; component validation
 * failures never throw (see PostComposer.composeWithReport). */

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class LookupError extends Error {
  constructor(
    public registry: string,
    public key: string,
  ) {
    super(`Unknown ${registry}: '${key}'`);
    this.name = 'LookupError';
  }
}

export class LengthExceededError extends Error {
  constructor(
    public length: number,
    public limit: number,
  ) {
    super(`Post exceeds ${limit} character limit: ${length} chars`);
    this.name = 'LengthExceededError';
  }
}

export class NoActiveDraftError extends Error {
  constructor() {
    super('No active draft. Create or switch to a draft first.');
    this.name = 'NoActiveDraftError';
  }
}
