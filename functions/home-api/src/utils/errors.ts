/**
 * No realm is served on the requested host
 */
export class RealmNotFoundError extends Error {
  constructor(public readonly host: string) {
    super(`No realm found for host: ${host}`);
    this.name = 'RealmNotFoundError';
  }
}

/**
 * The narrow query parameter is not a list of [operator, operand] pairs
 */
export class InvalidNarrowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidNarrowError';
  }
}
