/**
 * The store could not be read or written, or version conflicts on one user
 * outlasted the retry policy. Nothing was applied; the caller may redeliver.
 */
export class TransientDownstreamFailure extends Error {
  constructor(
    message: string,
    readonly userId?: string,
  ) {
    super(message);
    this.name = 'TransientDownstreamFailure';
  }
}
