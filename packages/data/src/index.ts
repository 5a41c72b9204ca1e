/**
 * Data layer exports
 */

// Database
export * from './db'

// Repositories
export * from './repositories'

// Errors
export { RotationConfirmationError } from './errors'

export const version = '1.0.0'
