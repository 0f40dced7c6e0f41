/**
 * Data layer exports
 */

export * from './db'
export { PersistenceError } from './errors'
export * from './repositories'
