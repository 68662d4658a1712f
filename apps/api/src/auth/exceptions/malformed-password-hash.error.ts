/**
 * A stored password hash could not be parsed. This is a data-integrity
 * problem, not a failed login, and surfaces as a 500.
 */
export class MalformedPasswordHashError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Stored password hash is malformed', options);
    this.name = 'MalformedPasswordHashError';
  }
}
