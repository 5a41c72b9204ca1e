/**
 * Error thrown when a rotation decision can't be applied to the active set
 */
export class RotationConfirmationError extends Error {
  constructor(
    message: string,
    public readonly decisionId: string
  ) {
    super(message)
    this.name = 'RotationConfirmationError'
  }
}
